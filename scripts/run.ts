import { runCli } from '../src/cli/run.ts';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e) => {
    console.error('[run] Unhandled error:', e);
    process.exit(1);
  });
