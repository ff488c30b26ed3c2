import { CANONICAL_NAMES, type ScriptTarget } from './types.js';

/**
 * Append a call of one canonical function to an extracted script.
 *
 * The result is source for a JS execution collaborator; the input is embedded as a
 * JSON string literal, so quotes and backslashes in it cannot break out of the call.
 *
 * @example
 * buildInvocation(script, 'decipher', 'AOq0QJ8w')
 * // => `${script}\nDecipherFunc("AOq0QJ8w");`
 */
export function buildInvocation(script: string, target: ScriptTarget, input: string): string {
  return `${script}\n${CANONICAL_NAMES[target]}(${JSON.stringify(input)});`;
}
