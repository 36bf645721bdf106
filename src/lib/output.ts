import { ANSI_COLORS } from '../config';

export type MessageKind = 'info' | 'success' | 'warning' | 'error';

const STYLES: Record<MessageKind, { color: string; tag: string }> = {
  info: { color: ANSI_COLORS.BLUE, tag: '🔧' },
  success: { color: ANSI_COLORS.GREEN, tag: '✅' },
  warning: { color: ANSI_COLORS.YELLOW, tag: '⚠️ ' },
  error: { color: ANSI_COLORS.RED, tag: '❌' },
};

/**
 * Colour only when writing to a terminal and NO_COLOR is unset or empty
 */
export function shouldUseColor(
  stream: { isTTY?: boolean },
  env: NodeJS.ProcessEnv = process.env
): boolean {
  return !env.NO_COLOR && stream.isTTY === true;
}

export function formatMessage(kind: MessageKind, message: string, color: boolean): string {
  const { color: code, tag } = STYLES[kind];
  const line = `${tag} ${message}`;
  return color ? `${code}${line}${ANSI_COLORS.RESET}` : line;
}

export const output = {
  info(message: string): void {
    console.log(formatMessage('info', message, shouldUseColor(process.stdout)));
  },

  success(message: string): void {
    console.log(formatMessage('success', message, shouldUseColor(process.stdout)));
  },

  warn(message: string): void {
    console.warn(formatMessage('warning', message, shouldUseColor(process.stderr)));
  },

  error(message: string): void {
    console.error(formatMessage('error', message, shouldUseColor(process.stderr)));
  },
};
