/**
 * 平衡括号扫描器
 *
 * 嵌套深度不定的片段（action object 方法体、n 函数体）不用正则重复匹配，
 * 而是按括号计数找到闭合位置。字符串与正则字面量内的括号不计数。
 */

const CLOSERS: Readonly<Record<string, string>> = {
  '{': '}',
  '[': ']',
  '(': ')',
};

/** 前一个有效字符是这些之一时，`/` 开始的是正则字面量而不是除号。 */
const REGEX_PRECEDERS = new Set(['(', ',', '=', ':', '[', '!', '&', '|', '?', '{', '}', ';']);

/**
 * 从 start 处的 `/` 跳过正则字面量（含字符类与转义），返回结尾 `/` 的下标。
 * 跨行或未闭合返回 -1。
 */
function skipRegexLiteral(source: string, start: number): number {
  let inClass = false;
  for (let i = start + 1; i < source.length; i++) {
    const char = source[i];
    if (char === '\\') {
      i++;
    } else if (char === '\n') {
      return -1;
    } else if (inClass) {
      if (char === ']') {
        inClass = false;
      }
    } else if (char === '[') {
      inClass = true;
    } else if (char === '/') {
      return i;
    }
  }
  return -1;
}

function startsRegexLiteral(source: string, index: number, previous: string): boolean {
  const next = source[index + 1];
  return next !== '/' && next !== '*' && (previous === '' || REGEX_PRECEDERS.has(previous));
}

/**
 * 从 openIndex 处的开括号开始，返回与之配对的闭括号下标；找不到返回 -1。
 * 只统计与开括号同类的括号。
 */
export function findClosingDelimiter(source: string, openIndex: number): number {
  const open = source[openIndex];
  const close = open === undefined ? undefined : CLOSERS[open];
  if (open === undefined || close === undefined) {
    return -1;
  }

  let depth = 0;
  let quote = '';
  let escaped = false;
  let previous = '';

  for (let i = openIndex; i < source.length; i++) {
    const char = source[i];

    if (quote) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === quote) {
        quote = '';
        previous = char;
      }
      continue;
    }

    if (char === '/' && startsRegexLiteral(source, i, previous)) {
      const end = skipRegexLiteral(source, i);
      if (end !== -1) {
        i = end;
        previous = '/';
        continue;
      }
    }

    if (char === '"' || char === "'" || char === '`') {
      quote = char;
    } else if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }

    if (!/\s/.test(char)) {
      previous = char;
    }
  }

  return -1;
}

/**
 * 返回 openIndex 开始、含首尾括号的完整块
 */
export function extractBalancedBlock(source: string, openIndex: number): string | undefined {
  const end = findClosingDelimiter(source, openIndex);
  return end === -1 ? undefined : source.slice(openIndex, end + 1);
}
