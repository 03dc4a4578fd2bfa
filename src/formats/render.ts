import type { InstructionRecord } from '../frontend/record.js';
import { mangleLabel } from '../frontend/label.js';
import type { RenderConfig } from './types.js';

/** Every annotation off: bare instructions, as fed to llvm-mca by `run`. */
export const BARE_RENDER: RenderConfig = Object.freeze({
  showFile: false,
  showOffset: false,
  showInstructionBytes: false,
  showHighLevelAsm: false,
});

function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

function annotations(record: InstructionRecord, config: RenderConfig): string[] {
  const out: string[] = [];
  if (config.showFile) out.push(`${record.sourceFile}:${record.sourceLine}`);
  if (config.showOffset) out.push(`0x${record.offset.toString(16)}`);
  if (config.showInstructionBytes) out.push(toHex(record.encodedBytes));
  if (config.showHighLevelAsm) out.push(record.highLevelAsm);
  return out;
}

/**
 * Render one instruction as tab-separated cells: the mnemonic, then each enabled annotation, the first
 * of which opens the `//` comment.
 */
export function renderInstruction(record: InstructionRecord, config: RenderConfig): string {
  const segments = annotations(record, config).map((text, i) => `\t${i === 0 ? '// ' : ''}${text}`);
  return `  ${record.architectureAsm}${segments.join('')}\n`;
}

export function renderLabel(symbol: string): string {
  return `${mangleLabel(symbol)}\n`;
}

/** Terminal line written in place of the instruction that ends the stream. */
export function renderStop(mnemonic: string): string {
  return `\t// stopping at ${mnemonic}\n`;
}
