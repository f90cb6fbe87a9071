import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigurationError, IOError, RemoteConnectionError, SourceUnavailableError } from '../errors.js';
import { FileSource, RemoteSource, formatAddress, parseAddress } from './sources.js';
import { fakeOpenssl } from '../testing/fixtures.js';

async function readAll(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe('parseAddress', () => {
  it('defaults to port 443', () => {
    expect(parseAddress('example.test')).toEqual({ host: 'example.test', port: 443 });
  });

  it('reads an explicit port', () => {
    expect(parseAddress('example.test:8443')).toEqual({ host: 'example.test', port: 8443 });
    expect(parseAddress('192.0.2.10:636')).toEqual({ host: '192.0.2.10', port: 636 });
  });

  it('handles IPv6 literals with and without brackets', () => {
    expect(parseAddress('[2001:db8::1]:8443')).toEqual({ host: '2001:db8::1', port: 8443 });
    expect(parseAddress('[2001:db8::1]')).toEqual({ host: '2001:db8::1', port: 443 });
    expect(parseAddress('2001:db8::1')).toEqual({ host: '2001:db8::1', port: 443 });
  });

  it.each(['', 'example.test:', 'example.test:https', 'example.test:0', 'example.test:70000', ':443'])(
    'rejects "%s"',
    value => {
      expect(() => parseAddress(value)).toThrow(ConfigurationError);
    },
  );

  it('brackets IPv6 hosts when formatting', () => {
    expect(formatAddress({ host: '2001:db8::1', port: 443 })).toBe('[2001:db8::1]:443');
    expect(formatAddress({ host: 'example.test', port: 443 })).toBe('example.test:443');
  });
});

describe('FileSource', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'certlens-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('streams the file line by line', async () => {
    const file = path.join(dir, 'chain.pem');
    fs.writeFileSync(file, 'first\r\nsecond\nthird\n');
    const source = new FileSource(file);
    expect(source.description).toBe(`file:${file}`);
    expect(await readAll(await source.open())).toEqual(['first', 'second', 'third']);
  });

  it('raises IOError for a missing path', async () => {
    const missing = path.join(dir, 'nope.pem');
    const err = await new FileSource(missing).open().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(IOError);
    expect(err).toBeInstanceOf(SourceUnavailableError);
    expect(err).toMatchObject({ code: 'E_SOURCE', path: missing });
  });

  it('raises IOError for a directory', async () => {
    await expect(new FileSource(dir).open()).rejects.toThrow(IOError);
  });
});

describe('RemoteSource', () => {
  const capture = 'CONNECTED(00000003)\n-----BEGIN CERTIFICATE-----\nQUJD\n-----END CERTIFICATE-----\nDONE\n';

  it('runs s_client with SNI and closes the session politely', async () => {
    const { runner, calls } = fakeOpenssl({ s_client: () => ({ stdout: capture }) });
    const source = new RemoteSource('example.test', { openssl: 'openssl', runner });
    expect(source.description).toBe('tls:example.test:443');
    const lines = await readAll(await source.open());
    expect(lines).toEqual(capture.split('\n'));
    expect(calls).toEqual([
      {
        command: 'openssl',
        args: ['s_client', '-showcerts', '-connect', 'example.test:443', '-servername', 'example.test'],
        input: 'Q\n',
      },
    ]);
  });

  it('omits SNI for IP literals', () => {
    const source = new RemoteSource('[2001:db8::1]:8443');
    expect(source.args()).toEqual(['s_client', '-showcerts', '-connect', '[2001:db8::1]:8443']);
  });

  it('accepts a session the peer closed under us', async () => {
    const { runner } = fakeOpenssl({ s_client: () => ({ code: null, signal: 'SIGPIPE', stdout: capture }) });
    const lines = await readAll(await new RemoteSource('example.test:8443', { runner }).open());
    expect(lines).toContain('QUJD');
  });

  it('raises RemoteConnectionError with the peer diagnostics', async () => {
    const stderr = 'connect:errno=111\n';
    const { runner } = fakeOpenssl({ s_client: () => ({ code: 1, stderr }) });
    const err = await new RemoteSource('example.test', { runner }).open().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RemoteConnectionError);
    expect(err).toMatchObject({
      address: 'example.test:443',
      diagnostics: stderr,
      message: 'cannot fetch certificate chain from example.test:443: connect:errno=111',
    });
  });

  it('validates the address on construction', () => {
    expect(() => new RemoteSource('example.test:99999')).toThrow(ConfigurationError);
  });
});
