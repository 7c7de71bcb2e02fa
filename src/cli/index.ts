#!/usr/bin/env node
import { describeError } from '../core/errors';
import { loadConfig } from '../daemon/config';
import { runDaemon } from '../daemon';
import { formatRequest, isErrorResponse, parseRequest } from '../daemon/protocol';
import { sendCommand } from './client';

export interface CliIo {
  write(message: string): void;
  writeError(message: string): void;
}

const consoleIo: CliIo = {
  write: (message) => process.stdout.write(`${message}\n`),
  writeError: (message) => process.stderr.write(`${message}\n`)
};

export function renderUsage(): string {
  return [
    'Usage: niri-sticky <command>',
    '',
    'daemon                 - Run the daemon in the foreground',
    'add <id>               - Make a window sticky',
    'remove <id>            - Stop a window from being sticky',
    'list                   - List sticky windows',
    'toggle_active          - Toggle sticky state of the focused window',
    'stage <id>             - Park a sticky window on the stage workspace',
    'stage --all            - Stage every sticky window',
    'stage --list           - List staged windows',
    'stage --active         - Stage or unstage the focused window',
    'unstage <id>           - Bring a staged window to the current workspace',
    'unstage --all          - Unstage every staged window',
    'unstage --active       - Unstage the focused window'
  ].join('\n');
}

/** Runs one CLI invocation and resolves with the process exit code. */
export async function main(
  argv: string[],
  io: CliIo = consoleIo,
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const [command] = argv;
  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    io.write(renderUsage());
    return command === undefined ? 2 : 0;
  }

  if (command === 'daemon') {
    await runDaemon({ config: loadConfig(env) });
    return 0;
  }

  let line: string;
  try {
    line = formatRequest(parseRequest(argv.join(' ')));
  } catch (error) {
    io.writeError(`Error: ${describeError(error)}`);
    io.writeError(renderUsage());
    return 2;
  }

  const config = loadConfig(env);
  const reply = await sendCommand(line, { socketPath: config.controlSocketPath });
  if (isErrorResponse(reply)) {
    io.writeError(reply);
    return 1;
  }
  io.write(reply);
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
