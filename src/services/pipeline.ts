import { MAX_RENEW_DAYS } from '../config.js';
import { ConfigurationError, MalformedTimestampError, MissingFieldError } from '../errors.js';
import logger, { type Logger } from '../logger.js';
import { splitPemLines, type CertificateBlock } from './pem.js';
import { checkTool, runCommand, type CommandRunner } from './process.js';
import { computeRenewal, type RenewalDecision } from './renewal.js';
import { FileSource, RemoteSource, type CertificateSource } from './sources.js';
import { extractCertificate, type CertificateRecord } from './x509.js';

export interface InspectOptions {
  file?: string;
  server?: string;
  /** Compute the renewal decision for the leaf certificate. */
  next: boolean;
  days: number;
  openssl: string;
  /** Parallel extractions; results keep chain order either way. */
  concurrency?: number;
}

export interface InspectDeps {
  runner?: CommandRunner;
  logger?: Logger;
}

export type RenewalOutcome =
  | { status: 'ok'; decision: RenewalDecision }
  | { status: 'missing'; error: MissingFieldError }
  | { status: 'malformed'; error: MalformedTimestampError }
  | { status: 'none' };

export interface InspectionResult {
  source: string;
  records: CertificateRecord[];
  renewal?: RenewalOutcome;
}

export function resolveSource(options: Pick<InspectOptions, 'file' | 'server' | 'openssl'>, runner: CommandRunner = runCommand): CertificateSource {
  const { file, server } = options;
  if (file !== undefined && server !== undefined) {
    throw new ConfigurationError('--file and --server are mutually exclusive');
  }
  if (file !== undefined) return new FileSource(file);
  if (server !== undefined) return new RemoteSource(server, { openssl: options.openssl, runner });
  throw new ConfigurationError('one of --file or --server is required');
}

async function mapInOrder<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;
  const worker = async () => {
    while (!failed && next < items.length) {
      const i = next++;
      try {
        results[i] = await fn(items[i]);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export function decideRenewal(records: CertificateRecord[], days: number): RenewalOutcome {
  const leaf = records[0];
  if (!leaf) return { status: 'none' };
  try {
    return { status: 'ok', decision: computeRenewal(leaf, days) };
  } catch (err) {
    if (err instanceof MissingFieldError) return { status: 'missing', error: err };
    if (err instanceof MalformedTimestampError) return { status: 'malformed', error: err };
    throw err;
  }
}

export async function inspect(options: InspectOptions, deps: InspectDeps = {}): Promise<InspectionResult> {
  const runner = deps.runner ?? runCommand;
  if (!Number.isInteger(options.days) || options.days < 0 || options.days > MAX_RENEW_DAYS) {
    throw new ConfigurationError(`renewal lead time must be an integer between 0 and ${MAX_RENEW_DAYS} days`);
  }
  const source = resolveSource(options, runner);
  const log = (deps.logger ?? logger).child({ source: source.description });

  const version = await checkTool(options.openssl, runner);
  log.debug({ openssl: version }, 'introspection tool ready');

  log.info('reading certificates');
  const lines = await source.open();
  const blocks: CertificateBlock[] = [];
  const onUnterminated = () => log.warn('input ends inside a certificate block; fragment dropped');
  for await (const block of splitPemLines(lines, { onUnterminated })) {
    blocks.push(block);
  }
  log.info({ count: blocks.length }, 'certificates found');

  const records = await mapInOrder(blocks, options.concurrency ?? 1, async block => {
    const record = await extractCertificate(block, { openssl: options.openssl, runner });
    log.debug({ index: block.index, subject: record.subject }, 'certificate extracted');
    return record;
  });

  const result: InspectionResult = { source: source.description, records };
  if (options.next) {
    result.renewal = decideRenewal(records, options.days);
    if (result.renewal.status === 'missing' || result.renewal.status === 'malformed') {
      log.warn({ err: result.renewal.error }, 'renewal not computed');
    }
  }
  return result;
}
