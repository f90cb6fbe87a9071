import { DEFAULT_INDENT_WIDTH } from './config.js';
import type { RenewalOutcome } from './services/pipeline.js';
import { formatInstant, type RenewalDecision } from './services/renewal.js';
import type { CertificateRecord } from './services/x509.js';

export interface RenderOptions {
  indent: boolean;
  indentWidth?: number;
}

export function renderRecords(records: CertificateRecord[], options: RenderOptions): string {
  const space = options.indent ? options.indentWidth ?? DEFAULT_INDENT_WIDTH : undefined;
  return JSON.stringify(records, null, space) + '\n';
}

/** notBefore, notAfter and nextRenewal, tab-separated, in the display zone. */
export function renderRenewal(decision: RenewalDecision, timeZone: string): string {
  return [decision.notBefore, decision.notAfter, decision.nextRenewal].map(d => formatInstant(d, timeZone)).join('\t') + '\n';
}

export function renderRenewalNote(outcome: RenewalOutcome): string | undefined {
  switch (outcome.status) {
    case 'ok':
      return undefined;
    case 'none':
      return 'renewal: no certificate found\n';
    case 'missing':
    case 'malformed':
      return `renewal: ${outcome.error.message}\n`;
  }
}
