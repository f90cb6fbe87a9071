import fs from 'fs';
import { isIP } from 'net';
import readline from 'readline';
import { ConfigurationError, IOError, RemoteConnectionError } from '../errors.js';
import { runCommand, type CommandRunner } from './process.js';

export const DEFAULT_TLS_PORT = 443;

/** Produces the raw text of one or more PEM certificates, line by line. */
export interface CertificateSource {
  readonly description: string;
  open(): Promise<AsyncIterable<string>>;
}

export class FileSource implements CertificateSource {
  readonly description: string;

  constructor(private readonly path: string) {
    this.description = `file:${path}`;
  }

  async open(): Promise<AsyncIterable<string>> {
    try {
      await fs.promises.access(this.path, fs.constants.R_OK);
      const stat = await fs.promises.stat(this.path);
      if (stat.isDirectory()) throw new Error('is a directory');
    } catch (err) {
      throw new IOError(this.path, { cause: err });
    }
    const stream = fs.createReadStream(this.path, { encoding: 'utf8' });
    return readline.createInterface({ input: stream, crlfDelay: Infinity });
  }
}

export interface RemoteAddress {
  host: string;
  port: number;
}

/** Parses host, host:port, [v6] or [v6]:port; the port defaults to 443. */
export function parseAddress(address: string): RemoteAddress {
  const value = address.trim();
  if (!value) throw new ConfigurationError('server address is empty');

  let host: string;
  let portText: string | undefined;
  const bracketed = /^\[([^\]]+)\](?::(.*))?$/.exec(value);
  if (bracketed) {
    host = bracketed[1];
    portText = bracketed[2];
  } else if (isIP(value) === 6) {
    host = value;
  } else {
    const colon = value.lastIndexOf(':');
    if (colon === -1) {
      host = value;
    } else {
      host = value.slice(0, colon);
      portText = value.slice(colon + 1);
    }
  }
  if (!host) throw new ConfigurationError(`server address "${address}" has no host`);
  if (portText === undefined) return { host, port: DEFAULT_TLS_PORT };

  const port = /^\d+$/.test(portText) ? parseInt(portText, 10) : NaN;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`server address "${address}" has an invalid port`);
  }
  return { host, port };
}

export function formatAddress({ host, port }: RemoteAddress): string {
  return isIP(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}

export interface RemoteSourceOptions {
  openssl?: string;
  runner?: CommandRunner;
}

/**
 * Captures the chain a TLS endpoint presents, as `openssl s_client -showcerts`
 * prints it. The capture is buffered; banner text around the PEM blocks is
 * left for the splitter to discard.
 */
export class RemoteSource implements CertificateSource {
  readonly description: string;
  readonly address: RemoteAddress;
  private readonly openssl: string;
  private readonly runner: CommandRunner;

  constructor(address: string, options: RemoteSourceOptions = {}) {
    this.address = parseAddress(address);
    this.description = `tls:${formatAddress(this.address)}`;
    this.openssl = options.openssl ?? 'openssl';
    this.runner = options.runner ?? runCommand;
  }

  args(): string[] {
    const { host } = this.address;
    const args = ['s_client', '-showcerts', '-connect', formatAddress(this.address)];
    // SNI only applies to names, not literal addresses.
    if (isIP(host) === 0) args.push('-servername', host);
    return args;
  }

  async open(): Promise<AsyncIterable<string>> {
    // "Q" asks s_client to close the session once the handshake is done.
    const result = await this.runner(this.openssl, this.args(), { input: 'Q\n' });
    const closedByPeer = result.code === null && result.signal === 'SIGPIPE';
    if (result.code !== 0 && !closedByPeer) {
      throw new RemoteConnectionError(formatAddress(this.address), result.stderr);
    }
    return toAsyncLines(result.stdout);
  }
}

async function* toAsyncLines(text: string): AsyncGenerator<string> {
  yield* text.split('\n');
}
