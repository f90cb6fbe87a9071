import { ExternalToolError } from '../errors.js';
import type { CertificateBlock } from './pem.js';
import { runCommand, type CommandRunner } from './process.js';

export interface SubjectAlternativeName {
  type: string;
  value: string;
}

/** Fields read from `openssl x509` text output; each one may be absent. */
export interface CertificateRecord {
  notBefore?: string;
  notAfter?: string;
  subject?: string;
  subjectHash?: string;
  san?: SubjectAlternativeName[];
  issuer?: string;
  issuerHash?: string;
}

export const X509_ARGS = [
  'x509',
  '-dates',
  '-subject',
  '-subject_hash',
  '-ext',
  'subjectAltName',
  '-issuer',
  '-issuer_hash',
  '-noout',
] as const;

const SAN_HEADER = 'X509v3 Subject Alternative Name:';

enum ParseState {
  Idle,
  AwaitingSubjectHash,
  AwaitingIssuerHash,
  AwaitingSan,
}

export function parseSanList(line: string): SubjectAlternativeName[] {
  const names: SubjectAlternativeName[] = [];
  for (const term of line.split(',')) {
    const entry = term.trim();
    if (!entry) continue;
    // IPv6 values contain colons; only the first one separates the type.
    const colon = entry.indexOf(':');
    if (colon === -1) {
      names.push({ type: entry, value: '' });
    } else {
      names.push({ type: entry.slice(0, colon).trim(), value: entry.slice(colon + 1).trim() });
    }
  }
  return names;
}

function afterPrefix(line: string, prefix: string): string | undefined {
  return line.startsWith(prefix) ? line.slice(prefix.length) : undefined;
}

/**
 * Single pass over the tool output. The hash lines carry no label of their
 * own, so the line right after `subject=` / `issuer=` is taken as the hash
 * whatever it looks like; the same goes for the line after the SAN header.
 */
export function parseX509Text(output: string): CertificateRecord {
  const fields: CertificateRecord = {};
  let state = ParseState.Idle;

  // A final newline terminates the last line; it does not start an empty one.
  const lines = output.endsWith('\n') ? output.slice(0, -1).split('\n') : output.split('\n');
  for (const rawLine of lines) {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;

    switch (state) {
      case ParseState.AwaitingSubjectHash:
        fields.subjectHash = line.trim();
        state = ParseState.Idle;
        continue;
      case ParseState.AwaitingIssuerHash:
        fields.issuerHash = line.trim();
        state = ParseState.Idle;
        continue;
      case ParseState.AwaitingSan:
        fields.san = parseSanList(line);
        state = ParseState.Idle;
        continue;
      case ParseState.Idle:
        break;
    }

    let value: string | undefined;
    if ((value = afterPrefix(line, 'notBefore=')) !== undefined) {
      fields.notBefore = value;
    } else if ((value = afterPrefix(line, 'notAfter=')) !== undefined) {
      fields.notAfter = value;
    } else if ((value = afterPrefix(line, 'subject=')) !== undefined) {
      fields.subject = value;
      state = ParseState.AwaitingSubjectHash;
    } else if ((value = afterPrefix(line, 'issuer=')) !== undefined) {
      fields.issuer = value;
      state = ParseState.AwaitingIssuerHash;
    } else if (line.trim() === SAN_HEADER) {
      state = ParseState.AwaitingSan;
    }
  }

  return orderRecord(fields);
}

// Stable key order keeps the rendered JSON byte-identical between runs.
function orderRecord(fields: CertificateRecord): CertificateRecord {
  const record: CertificateRecord = {};
  if (fields.notBefore !== undefined) record.notBefore = fields.notBefore;
  if (fields.notAfter !== undefined) record.notAfter = fields.notAfter;
  if (fields.subject !== undefined) record.subject = fields.subject;
  if (fields.subjectHash !== undefined) record.subjectHash = fields.subjectHash;
  if (fields.san !== undefined) record.san = fields.san;
  if (fields.issuer !== undefined) record.issuer = fields.issuer;
  if (fields.issuerHash !== undefined) record.issuerHash = fields.issuerHash;
  return record;
}

export interface ExtractOptions {
  openssl?: string;
  runner?: CommandRunner;
}

export async function extractCertificate(block: CertificateBlock, options: ExtractOptions = {}): Promise<CertificateRecord> {
  const openssl = options.openssl ?? 'openssl';
  const runner = options.runner ?? runCommand;
  const result = await runner(openssl, [...X509_ARGS], { input: `${block.pem}\n` });
  if (result.code !== 0) {
    throw new ExternalToolError(`${openssl} x509 (certificate #${block.index})`, result.code, result.stderr);
  }
  return parseX509Text(result.stdout);
}
