/**
 * Message formatting
 *
 * ICU message syntax (placeholders, plural, select) through intl-messageformat.
 * Engine errors are not caught here: a malformed pattern reaches the caller.
 */

import { IntlMessageFormat } from 'intl-messageformat';
import type { Message, MessageArgs, MessageArgValue, MessageFormatter, MessageTree } from './types.js';

export class IcuMessageFormatter implements MessageFormatter {
  format(locale: string, pattern: string, args: Readonly<Record<string, MessageArgValue>>): string {
    const output = new IntlMessageFormat(pattern, locale).format<string>(args);
    return Array.isArray(output) ? output.join('') : output;
  }
}

/**
 * Whether the runtime carries the Intl pieces ICU formatting needs
 */
export function detectIntlSupport(): boolean {
  return (
    typeof Intl === 'object' &&
    typeof Intl.PluralRules === 'function' &&
    typeof Intl.NumberFormat === 'function'
  );
}

function isPositional(args: MessageArgs): args is readonly MessageArgValue[] {
  return Array.isArray(args);
}

/**
 * Positional arguments become named ones: ['a', 'b'] -> { 0: 'a', 1: 'b' }
 */
export function normalizeArgs(args: MessageArgs): Readonly<Record<string, MessageArgValue>> {
  if (isPositional(args)) {
    return Object.fromEntries(args.map((value, index) => [String(index), value]));
  }
  return args;
}

function hasArgs(args: MessageArgs): boolean {
  return isPositional(args) ? args.length > 0 : Object.keys(args).length > 0;
}

function formatValue(
  message: Message,
  locale: string,
  args: Readonly<Record<string, MessageArgValue>>,
  engine: MessageFormatter
): Message {
  if (typeof message === 'string') {
    return engine.format(locale, message, args);
  }
  if (Array.isArray(message)) {
    return message.map(item => engine.format(locale, item, args));
  }

  const tree: MessageTree = {};
  for (const [key, value] of Object.entries(message)) {
    Object.defineProperty(tree, key, {
      value: formatValue(value, locale, args, engine),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return tree;
}

/**
 * Substitute `args` into a resolved message. Without an engine or without
 * arguments the message comes back untouched.
 */
export function formatMessage(
  message: Message,
  locale: string,
  args: MessageArgs,
  engine: MessageFormatter | null
): Message {
  if (!engine || !hasArgs(args)) {
    return message;
  }
  return formatValue(message, locale, normalizeArgs(args), engine);
}
