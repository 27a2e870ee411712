import { NavError, getSuggestion, type ErrorCode } from '../errors/index.ts';

/**
 * One rendered navigator item.
 */
export interface TreeLine {
  depth: number;
  icon: string;
  label: string;
}

export const DEFAULT_INDENT_WIDTH = 2;

/**
 * Collects tree lines in emission order, plus the non-fatal problems met on the way.
 */
export class TreeWriter {
  readonly lines: TreeLine[] = [];
  readonly warnings: NavError[] = [];

  write(depth: number, icon: string, label: string): TreeLine {
    const line = { depth, icon, label };
    this.lines.push(line);
    return line;
  }

  warn(code: ErrorCode, message: string): void {
    this.warnings.push(new NavError(code, message, 'warning', getSuggestion(code)));
  }
}

export function formatLine(line: TreeLine, indentWidth = DEFAULT_INDENT_WIDTH): string {
  return `${' '.repeat(indentWidth * line.depth)}${line.icon} ${line.label}`;
}

export function formatTree(lines: TreeLine[], indentWidth = DEFAULT_INDENT_WIDTH): string[] {
  return lines.map((line) => formatLine(line, indentWidth));
}
