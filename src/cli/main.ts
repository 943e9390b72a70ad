// .env has to be loaded before the logger and config read the environment
import 'dotenv/config';
import { runDecide } from './decide.js';

process.exitCode = runDecide(process.argv.slice(2), {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
});
