import forge from 'node-forge';
import type { CommandOptions, CommandResult, CommandRunner } from '../services/process.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FixtureCert {
  commonName: string;
  pem: string;
}

// Small keys keep forge's pure-JS key generation fast; nothing verifies them.
export function selfSignedCert(commonName: string, validDays = 90): FixtureCert {
  const keys = forge.pki.rsa.generateKeyPair(1024);
  const cert = forge.pki.createCertificate();
  cert.publicKey = keys.publicKey;
  cert.serialNumber = '01';
  cert.validity.notBefore = new Date(Date.UTC(2025, 0, 1));
  cert.validity.notAfter = new Date(cert.validity.notBefore.getTime() + validDays * DAY_MS);
  const attrs = [{ name: 'commonName', value: commonName }];
  cert.setSubject(attrs);
  cert.setIssuer(attrs);
  cert.setExtensions([
    { name: 'basicConstraints', cA: false },
    { name: 'subjectAltName', altNames: [{ type: 2, value: commonName }] },
  ]);
  cert.sign(keys.privateKey, forge.md.sha256.create());
  // forge writes CRLF; the splitter normalises to LF.
  const pem = forge.pki.certificateToPem(cert).replace(/\r\n/g, '\n').trim();
  return { commonName, pem };
}

export interface FakeCall {
  command: string;
  args: string[];
  input?: string;
}

export type FakeHandler = (args: string[], options: CommandOptions) => Partial<CommandResult>;

/**
 * In-process stand-in for the openssl binary. `version` always succeeds;
 * every other subcommand goes to the handler registered for it.
 */
export function fakeOpenssl(handlers: Record<string, FakeHandler>): { runner: CommandRunner; calls: FakeCall[] } {
  const calls: FakeCall[] = [];
  const runner: CommandRunner = async (command, args, options = {}) => {
    calls.push({ command, args, input: options.input });
    const sub = args[0];
    if (sub === 'version') return { code: 0, signal: null, stdout: 'OpenSSL 3.0.13 30 Jan 2024\n', stderr: '' };
    const handler = handlers[sub];
    if (!handler) return { code: 1, signal: null, stdout: '', stderr: `${sub}: no fake registered\n` };
    return { code: 0, signal: null, stdout: '', stderr: '', ...handler(args, options) };
  };
  return { runner, calls };
}

export function x509Output(fields: { notBefore?: string; notAfter?: string; subject?: string; issuer?: string; sans?: string }): string {
  const lines: string[] = [];
  if (fields.notBefore) lines.push(`notBefore=${fields.notBefore}`);
  if (fields.notAfter) lines.push(`notAfter=${fields.notAfter}`);
  if (fields.subject) lines.push(`subject=${fields.subject}`, '1a2b3c4d');
  if (fields.sans) lines.push('X509v3 Subject Alternative Name: ', `    ${fields.sans}`);
  if (fields.issuer) lines.push(`issuer=${fields.issuer}`, '5e6f7a8b');
  return lines.join('\n') + '\n';
}
