import { cac } from 'cac';

import { registerReportCommands, type ReportCommandDeps } from './commands/report';
import { renderCliError } from './errors';

export const CLI_VERSION = '0.1.0';

export function createCli(deps?: ReportCommandDeps) {
  const cli = cac('batchstat');

  cli.option('--json', 'Print reports as JSON');
  cli.option('--debug', 'Verbose logging and stack traces on errors');

  registerReportCommands(cli, deps);

  cli.help();
  cli.version(CLI_VERSION);
  return cli;
}

export async function run(argv: string[], deps?: ReportCommandDeps): Promise<number> {
  const cli = createCli(deps);
  const debug = argv.includes('--debug');
  try {
    cli.parse(argv, { run: false });
    if (!cli.matchedCommand) {
      if (!cli.options['help'] && !cli.options['version']) {
        cli.outputHelp();
      }
      return 0;
    }
    await cli.runMatchedCommand();
    return 0;
  } catch (error) {
    const rendered = renderCliError(error, { debug });
    console.error(rendered.message);
    return rendered.error.exitCode;
  }
}
