import { run } from './cli/cli';

process.exitCode = await run(process.argv);
