import fs from 'fs';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { DEFAULT_INDENT_WIDTH, MAX_RENEW_DAYS, loadConfig } from './config.js';
import { CertlensError } from './errors.js';
import { runLogger } from './logger.js';
import { renderRecords, renderRenewal, renderRenewalNote } from './render.js';
import { inspect, type InspectDeps } from './services/pipeline.js';
import { assertTimeZone } from './services/renewal.js';

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

type CliFlags = {
  file?: string;
  server?: string;
  indent: boolean;
  indentWidth: number;
  next: boolean;
  days: number;
  timezone: string;
  openssl: string;
  concurrency: number;
};

const processIo: CliIo = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
};

function integer(min: number, max = Number.MAX_SAFE_INTEGER) {
  return (value: string): number => {
    const n = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
    if (!Number.isInteger(n) || n < min || n > max) {
      throw new InvalidArgumentError(max === Number.MAX_SAFE_INTEGER ? `expected an integer >= ${min}` : `expected an integer between ${min} and ${max}`);
    }
    return n;
  };
}

function packageVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  return '0.0.0';
}

function buildProgram(io: CliIo, env: NodeJS.ProcessEnv): Command {
  const config = loadConfig(env);
  return new Command()
    .name('certlens')
    .description('Report identity fields of a certificate chain and when the leaf should be renewed')
    .version(packageVersion())
    .option('--file <path>', 'read PEM certificates from a local file')
    .option('--server <host[:port]>', 'fetch the chain presented by a TLS endpoint (port defaults to 443)')
    .option('--indent', 'pretty-print the JSON report', true)
    .option('--no-indent', 'print the JSON report on one line')
    .option('--indent-width <n>', 'spaces per indent level', integer(0), DEFAULT_INDENT_WIDTH)
    .option('--next', 'print the renewal summary for the leaf certificate on stderr', true)
    .option('--no-next', 'skip the renewal summary')
    .option('--days <n>', 'renew this many days before expiry', integer(0, MAX_RENEW_DAYS), config.renewDays)
    .option('--timezone <zone>', 'IANA time zone for the renewal summary', config.timeZone)
    .option('--openssl <path>', 'openssl binary used to read certificates', config.openssl)
    .option('--concurrency <n>', 'certificates inspected in parallel', integer(1), 1)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

/** Runs one invocation and returns the process exit code. */
export async function main(argv: string[], io: CliIo = processIo, deps: InspectDeps = {}, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const program = buildProgram(io, env);
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const flags = program.opts<CliFlags>();
  const log = deps.logger ?? runLogger();
  try {
    const timeZone = assertTimeZone(flags.timezone);
    const result = await inspect(
      {
        file: flags.file,
        server: flags.server,
        next: flags.next,
        days: flags.days,
        openssl: flags.openssl,
        concurrency: flags.concurrency,
      },
      { ...deps, logger: log },
    );

    io.stdout(renderRecords(result.records, { indent: flags.indent, indentWidth: flags.indentWidth }));
    if (result.renewal) {
      if (result.renewal.status === 'ok') io.stderr(renderRenewal(result.renewal.decision, timeZone));
      const note = renderRenewalNote(result.renewal);
      if (note) io.stderr(note);
    }
    return 0;
  } catch (err) {
    if (err instanceof CertlensError) {
      log.error({ err, code: err.code }, 'inspection failed');
      io.stderr(`certlens: ${err.message}\n`);
    } else {
      log.error({ err }, 'unexpected failure');
      io.stderr(`certlens: ${err instanceof Error ? err.message : String(err)}\n`);
    }
    return 1;
  }
}
