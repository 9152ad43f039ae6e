import { error, info, warn } from './log';

export type MessageLevel = 'success' | 'info' | 'warning' | 'error';

export interface UserMessage {
  level: MessageLevel;
  text: string;
}

/** User-facing status channel; every message is mirrored to the log. */
export interface Reporter {
  success(text: string): void;
  info(text: string): void;
  warning(text: string): void;
  error(text: string): void;
}

function mirror(level: MessageLevel, text: string) {
  if (level === 'error') error('report', { level, text });
  else if (level === 'warning') warn('report', { level, text });
  else info('report', { level, text });
}

export function collectingReporter(sink: UserMessage[]): Reporter {
  const push = (level: MessageLevel) => (text: string) => {
    sink.push({ level, text });
    mirror(level, text);
  };
  return {
    success: push('success'),
    info: push('info'),
    warning: push('warning'),
    error: push('error'),
  };
}

export const logReporter: Reporter = {
  success: (text) => mirror('success', text),
  info: (text) => mirror('info', text),
  warning: (text) => mirror('warning', text),
  error: (text) => mirror('error', text),
};
