import { runBenchmark } from './runner.js';

runBenchmark(process.argv.slice(2)).catch(err => { console.error(err); process.exit(1); });
