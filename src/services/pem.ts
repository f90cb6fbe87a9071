export const PEM_BEGIN = '-----BEGIN CERTIFICATE-----';
export const PEM_END = '-----END CERTIFICATE-----';

/** One certificate as it appeared in the source, delimiter lines included. */
export interface CertificateBlock {
  readonly index: number;
  readonly pem: string;
}

/**
 * Line-at-a-time PEM state machine. Feed it lines in order; it returns the
 * completed certificate text when an END line closes an open block.
 */
export class PemSplitter {
  private buffer: string[] = [];
  private inside = false;

  push(rawLine: string): string | undefined {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    const trimmed = line.trim();
    if (!this.inside) {
      if (trimmed === PEM_BEGIN) {
        this.inside = true;
        this.buffer = [line];
      }
      return undefined;
    }
    this.buffer.push(line);
    if (trimmed !== PEM_END) return undefined;
    const pem = this.buffer.join('\n').trim();
    this.buffer = [];
    this.inside = false;
    return pem;
  }

  /** True while a BEGIN line has been seen without its END. */
  get pending(): boolean {
    return this.inside;
  }
}

export interface SplitOptions {
  /** Called once when the input ends inside a block; the fragment is dropped. */
  onUnterminated?: () => void;
}

export function* splitPemText(text: string, options: SplitOptions = {}): Generator<CertificateBlock> {
  const splitter = new PemSplitter();
  let index = 0;
  for (const line of text.split('\n')) {
    const pem = splitter.push(line);
    if (pem !== undefined) yield { index: index++, pem };
  }
  if (splitter.pending) options.onUnterminated?.();
}

export async function* splitPemLines(
  lines: AsyncIterable<string> | Iterable<string>,
  options: SplitOptions = {},
): AsyncGenerator<CertificateBlock> {
  const splitter = new PemSplitter();
  let index = 0;
  for await (const line of lines) {
    const pem = splitter.push(line);
    if (pem !== undefined) yield { index: index++, pem };
  }
  if (splitter.pending) options.onUnterminated?.();
}
