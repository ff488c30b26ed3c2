/**
 * 结构模式库
 *
 * 每个匹配器对应一种可识别的语句 / 表达式形状，标识符一律用通配符捕获，
 * 从不依赖具体名称。所有匹配都是「整包首个命中即返回」。
 *
 * 嵌套深度不定的部分（action object、n 函数体）由正则定位头部，
 * 再交给 BraceScanner 计数找闭合，最后用锚定到结尾的正则校验尾部形状。
 */

import { findClosingDelimiter } from './BraceScanner.js';
import type {
  ActionObjectMatch,
  ArrayHelperOperation,
  DecipherDriverKind,
  DecipherDriverMatch,
  GlobalDeclarationMatch,
  HelperObjectMatch,
  IndirectionTable,
  NTransformMatch,
  NTransformShapeKind,
} from './types.js';

// ==================== 通配符 ====================

export const IDENTIFIER = '[a-zA-Z_$][a-zA-Z0-9_$]*';
/** Object-literal key, optionally quoted. */
const KEY = `["']?${IDENTIFIER}["']?`;
/** `.name`, `["name"]` or `['name']`. */
export const PROPERTY_ACCESS = String.raw`(?:\[["']|\.)${IDENTIFIER}(?:["']\]|)`;
const STRING_LITERAL = String.raw`(?:"[^"\\]*(?:\\.[^"\\]*)*"|'[^'\\]*(?:\\.[^'\\]*)*')`;
const TABLE_LOOKUP = String.raw`${IDENTIFIER}\[\d+\]`;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ==================== 数组辅助操作 ====================

export const HELPER_OPERATIONS: readonly ArrayHelperOperation[] = [
  'reverse',
  'slice-from',
  'splice-drop-prefix',
  'swap-first-and-nth',
];

const HELPER_OPERATION_SHAPES: Readonly<Record<ArrayHelperOperation, string>> = {
  reverse: String.raw`:function\(\w\)\{(?:return )?\w\.reverse\(\)\}`,
  'slice-from': String.raw`:function\(\w,\w\)\{return \w\.slice\(\w\)\}`,
  'splice-drop-prefix': String.raw`:function\(\w,\w\)\{\w\.splice\(0,\w\)\}`,
  'swap-first-and-nth': String.raw`:function\(\w,\w\)\{var \w=\w\[0\];\w\[0\]=\w\[\w%\w\.length\];\w\[\w(?:%\w\.length|)\]=\w(?:;return \w)?\}`,
};

const HELPER_ENTRY_MATCHERS = HELPER_OPERATIONS.map((kind) => ({
  kind,
  exact: new RegExp(`^${KEY}${HELPER_OPERATION_SHAPES[kind]}$`),
  // 在对象体内按条目查找：条目位于行首或逗号之后
  inBody: new RegExp(String.raw`(?:^|,)["']?(${IDENTIFIER})["']?${HELPER_OPERATION_SHAPES[kind]}`, 'm'),
}));

/**
 * 把单个对象字面量条目（`key:function(...){...}`）归类为四种辅助操作之一
 */
export function classifyHelperOperation(entry: string): ArrayHelperOperation | undefined {
  return HELPER_ENTRY_MATCHERS.find(({ exact }) => exact.test(entry))?.kind;
}

/**
 * 在 helper 对象体中找出每种已识别操作对应的键名
 */
export function findHelperOperations(body: string): Partial<Record<ArrayHelperOperation, string>> {
  const found: Partial<Record<ArrayHelperOperation, string>> = {};
  for (const { kind, inBody } of HELPER_ENTRY_MATCHERS) {
    const key = inBody.exec(body)?.[1];
    if (key !== undefined) {
      found[kind] = key;
    }
  }
  return found;
}

const HELPER_OBJECT_PATTERN = new RegExp(
  `var (${IDENTIFIER})=\\{((?:(?:` +
    HELPER_OPERATIONS.map((kind) => KEY + HELPER_OPERATION_SHAPES[kind]).join('|') +
    String.raw`),?\n?)+)\};`,
);

export function matchHelperObject(bundle: string): HelperObjectMatch | undefined {
  const match = HELPER_OBJECT_PATTERN.exec(bundle);
  if (!match) {
    return undefined;
  }
  const [source, name = '', body = ''] = match;
  return { source, index: match.index, name, body };
}

// ==================== 解密驱动函数 ====================

const DRIVER_PATTERNS: ReadonlyArray<{ kind: DecipherDriverKind; pattern: RegExp }> = [
  {
    kind: 'direct',
    pattern: new RegExp(
      String.raw`function(?: ${IDENTIFIER})?\(([a-zA-Z])\)\{\1=\1\.split\(""\);\s*` +
        String.raw`((?:(?:\1=)?${IDENTIFIER}${PROPERTY_ACCESS}\(\1,\d+\);)+)` +
        String.raw`return \1\.join\(""\)\}`,
    ),
  },
  {
    // split/join 的参数可能换成查表 XX[N]
    kind: 'table-split',
    pattern: new RegExp(
      String.raw`function(?:\s+${IDENTIFIER})?\((\w)\)\{\1=\1\.split\((?:""|(${IDENTIFIER})\[\d+\])\);\s*` +
        String.raw`((?:(?:\1=)?${IDENTIFIER}${PROPERTY_ACCESS}\(\1,\d+\);)+)` +
        String.raw`return \1\.join\((?:""|${TABLE_LOOKUP})\)\}`,
    ),
  },
  {
    // 方法名与 split/join 全部换成查表，固定三次调用
    kind: 'table-indexed',
    pattern: new RegExp(
      String.raw`function\(\s*([a-zA-Z0-9$])\s*\)\s*\{` +
        String.raw`\s*\1\s*=\s*\1\[(${IDENTIFIER})\[\d+\]\]\(\2\[\d+\]\);` +
        String.raw`\s*(${IDENTIFIER})\[\2\[\d+\]\]\(\s*\1\s*,\s*\d+\s*\);` +
        String.raw`\s*\3\[\2\[\d+\]\]\(\s*\1\s*,\s*\d+\s*\);` +
        String.raw`[^{}]*?return\s*\1\[\2\[\d+\]\]\(\2\[\d+\]\)\};?`,
    ),
  },
];

export function matchDecipherDriver(bundle: string, kind: DecipherDriverKind): DecipherDriverMatch | undefined {
  const entry = DRIVER_PATTERNS.find((candidate) => candidate.kind === kind);
  const match = entry?.pattern.exec(bundle);
  if (!match) {
    return undefined;
  }

  const result: DecipherDriverMatch = {
    source: match[0],
    index: match.index,
    kind,
    parameter: match[1] ?? '',
  };
  if (kind === 'table-split' && match[2] !== undefined) {
    result.tableName = match[2];
  }
  if (kind === 'table-indexed') {
    result.tableName = match[2];
    result.objectName = match[3];
  }
  return result;
}

// ==================== Action object ====================

const ACTION_METHOD_HEAD = new RegExp(String.raw`\s*${KEY}\s*:\s*function\s*\([^)]*\)\s*`, 'y');
const WHITESPACE = /\s*/y;

function skipWhitespace(source: string, from: number): number {
  WHITESPACE.lastIndex = from;
  WHITESPACE.exec(source);
  return WHITESPACE.lastIndex;
}

/**
 * 解析 `{` 之后的对象体：每个条目都是函数值，函数体按括号计数。
 * 返回条目键名与闭合 `}` 之后的位置；形状不符返回 undefined。
 */
function scanMethodObject(source: string, from: number): { keys: string[]; end: number } | undefined {
  const keys: string[] = [];
  let pos = from;

  for (;;) {
    ACTION_METHOD_HEAD.lastIndex = pos;
    const head = ACTION_METHOD_HEAD.exec(source);
    if (!head) {
      return undefined;
    }
    pos = ACTION_METHOD_HEAD.lastIndex;
    if (source[pos] !== '{') {
      return undefined;
    }
    const close = findClosingDelimiter(source, pos);
    if (close === -1) {
      return undefined;
    }
    keys.push(head[0].slice(0, head[0].indexOf(':')).trim().replace(/["']/g, ''));

    pos = skipWhitespace(source, close + 1);
    if (source[pos] === ',') {
      pos++;
      continue;
    }
    if (source[pos] === '}') {
      return { keys, end: pos + 1 };
    }
    return undefined;
  }
}

/**
 * 匹配恰好含三个函数条目的 action object；name 给定时只认该变量名
 */
export function matchActionObject(bundle: string, name?: string): ActionObjectMatch | undefined {
  const target = name === undefined ? `(${IDENTIFIER})` : `(${escapeRegExp(name)})`;
  const opener = new RegExp(String.raw`var\s+${target}\s*=\s*\{`, 'g');

  for (const candidate of bundle.matchAll(opener)) {
    const start = candidate.index ?? 0;
    const scanned = scanMethodObject(bundle, start + candidate[0].length);
    if (!scanned || scanned.keys.length !== 3) {
      continue;
    }
    const end = skipWhitespace(bundle, scanned.end);
    if (bundle[end] !== ';') {
      continue;
    }
    return {
      source: bundle.slice(start, end + 1),
      index: start,
      name: candidate[1] ?? '',
      methodKeys: scanned.keys,
    };
  }

  return undefined;
}

// ==================== 全局声明 ====================

const INDIRECTION_TABLE_PATTERN = new RegExp(
  String.raw`(?:'use\s*strict';)?` +
    String.raw`(var\s+(${IDENTIFIER})\s*=\s*` +
    String.raw`(?:${STRING_LITERAL}\.split\(${STRING_LITERAL}\)` +
    String.raw`|\[\s*(?:${STRING_LITERAL}\s*(?:,\s*)?)+\]))`,
);

export function matchIndirectionTable(bundle: string): IndirectionTable | undefined {
  const match = INDIRECTION_TABLE_PATTERN.exec(bundle);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return undefined;
  }
  return { variableName: match[2], declarationSource: match[1] };
}

function globalDeclarationPattern(name: string): RegExp {
  return new RegExp(
    String.raw`(?:^|[;,])\s*(var\s+(${name})\s*=\s*` +
      String.raw`(?:${STRING_LITERAL}\s*\.\s*split\(${STRING_LITERAL}\)` +
      String.raw`|\[\s*(?:${STRING_LITERAL}\s*(?:,\s*)?)+\]))(?=\s*[,;])`,
    'm',
  );
}

const ANY_GLOBAL_DECLARATION = globalDeclarationPattern(IDENTIFIER);

/**
 * 匹配 split 字符串或字符串数组形式的全局 `var` 声明；name 给定时只认该变量
 */
export function matchGlobalDeclaration(bundle: string, name?: string): GlobalDeclarationMatch | undefined {
  const pattern = name === undefined ? ANY_GLOBAL_DECLARATION : globalDeclarationPattern(escapeRegExp(name));
  const match = pattern.exec(bundle);
  if (!match || match[1] === undefined || match[2] === undefined) {
    return undefined;
  }
  return {
    source: match[1],
    index: match.index + match[0].indexOf(match[1]),
    variableName: match[2],
  };
}

// ==================== n 变换函数 ====================

interface NTransformShape {
  kind: NTransformShapeKind;
  /**
   * Head up to and including the `[` that opens the second `var` initializer.
   * Named groups: `parameter`, `split`, `array`, and `table` where the shape indexes one.
   */
  head: RegExp;
  /** Sticky; checked right after the array literal closes. */
  afterArray: (arrayVariable: string) => RegExp;
  /** Anchored at the end of the function span. */
  tail: (parameter: string, splitVariable: string) => RegExp;
}

const N_TRANSFORM_SHAPES: readonly NTransformShape[] = [
  {
    kind: 'modern',
    head: new RegExp(
      String.raw`function\s*\((?<parameter>[\w$]+)\)\s*\{var\s*(?<split>[\w$]+)\s*=\s*` +
        String.raw`\k<parameter>\[(?<table>${IDENTIFIER})\[\d+\]\]\(\k<table>\[\d+\]\)\s*,\s*(?<array>[\w$]+)\s*=\s*\[`,
      'g',
    ),
    afterArray: () => /;/y,
    tail: (p, b) =>
      new RegExp(
        String.raw`catch\s*\(\s*[\w$]+\s*\)\s*\{return\s*${TABLE_LOOKUP}\s*\+\s*${p}\}` +
          String.raw`\s*return\s*${b}\[${TABLE_LOOKUP}\]\(${TABLE_LOOKUP}\)\}$`,
      ),
  },
  {
    kind: 'legacy',
    head: new RegExp(
      String.raw`function\(\s*(?<parameter>[\w$]+)\s*\)\s*\{var\s*(?<split>[\w$]+)=` +
        String.raw`(?:\k<parameter>\.split\([^()]*\)|String\.prototype\.split\.call\(\k<parameter>,[^()]*\)),\s*(?<array>[\w$]+)=\[`,
      'g',
    ),
    // 数组声明后紧跟对该数组的下标访问
    afterArray: (c) => new RegExp(String.raw`;\s*${c}\[\d+\]`, 'y'),
    tail: (p, b) =>
      new RegExp(
        String.raw`\}catch\(\s*[\w$]+\s*\)\s*\{\s*return"[\w-]+"\s*\+\s*${p}\s*\}` +
          String.raw`\s*return\s*(?:${b}\.join\(""\)|Array\.prototype\.join\.call\(${b},[^()]*\))\}$`,
      ),
  },
  {
    kind: 'legacy-table',
    head: new RegExp(
      String.raw`function\(\s*(?<parameter>[\w$]+)\s*\)\s*\{\s*var\s*(?<split>[\w$]+)=` +
        String.raw`\k<parameter>\.split\(\k<parameter>\.slice\(0,0\)\),\s*(?<array>[\w$]+)=\[`,
      'g',
    ),
    afterArray: () => /;/y,
    tail: (p, b) =>
      new RegExp(
        String.raw`catch\(\s*[\w$]+\s*\)\s*\{\s*return(?:"[^"]+"|\s*${TABLE_LOOKUP})\s*\+\s*${p}\s*\}` +
          String.raw`\s*return\s*${b}\.join\((?:""|${TABLE_LOOKUP})\)\}$`,
      ),
  },
];

const STATEMENT_END = /\s*;/y;
const TRY_BLOCK = /\btry\s*\{/;

/**
 * 头部正则定位候选，括号计数确定数组与函数体范围，再校验数组后缀与尾部形状。
 * 返回第一个完整符合的候选；span 不含结尾分号。
 */
export function matchNTransform(bundle: string, kind: NTransformShapeKind): NTransformMatch | undefined {
  const shape = N_TRANSFORM_SHAPES.find((candidate) => candidate.kind === kind);
  if (!shape) {
    return undefined;
  }

  for (const head of bundle.matchAll(shape.head)) {
    const text = head[0];
    const groups: Partial<Record<string, string>> = head.groups ?? {};
    const { parameter, split: splitVariable, array: arrayVariable, table: tableName } = groups;
    if (parameter === undefined || splitVariable === undefined || arrayVariable === undefined) {
      continue;
    }
    const start = head.index ?? 0;

    const arrayClose = findClosingDelimiter(bundle, start + text.length - 1);
    if (arrayClose === -1) {
      continue;
    }
    const afterArray = shape.afterArray(escapeRegExp(arrayVariable));
    afterArray.lastIndex = arrayClose + 1;
    if (!afterArray.test(bundle)) {
      continue;
    }

    const bodyClose = findClosingDelimiter(bundle, bundle.indexOf('{', start));
    if (bodyClose === -1) {
      continue;
    }
    STATEMENT_END.lastIndex = bodyClose + 1;
    if (!STATEMENT_END.test(bundle)) {
      continue;
    }

    const source = bundle.slice(start, bodyClose + 1);
    if (kind === 'legacy' && !TRY_BLOCK.test(source)) {
      continue;
    }
    if (!shape.tail(escapeRegExp(parameter), escapeRegExp(splitVariable)).test(source)) {
      continue;
    }

    const result: NTransformMatch = { source, index: start, kind, parameter };
    if (tableName !== undefined) {
      result.tableName = tableName;
    }
    return result;
  }

  return undefined;
}

// ==================== 参数与短路守卫 ====================

const FUNCTION_PARAMETER = /function\s*\(\s*([\w$]+)\s*\)/;

export function matchFunctionParameter(fragment: string): string | undefined {
  return FUNCTION_PARAMETER.exec(fragment)?.[1];
}

/**
 * 新版守卫：`;if(typeof x==="undefined")return y;`，或用间接表下标代替 "undefined"
 */
export function modernGuardPattern(tableName?: string): RegExp {
  const tableAlternative = tableName === undefined ? '' : String.raw`|${escapeRegExp(tableName)}\[\d+\]`;
  return new RegExp(
    String.raw`;\s*if\s*\(\s*typeof\s+[a-zA-Z0-9_$]+\s*===?\s*(?:"undefined"|'undefined'${tableAlternative})\s*\)\s*return\s+[\w$]+(?=;)`,
    'g',
  );
}

/**
 * 旧版守卫：按参数名匹配 `if(typeof ...)return <param>;`
 */
export function legacyGuardPattern(parameter: string): RegExp {
  return new RegExp(
    String.raw`if\s*\(typeof\s*[^\s()]+\s*===?[^()]*?\)return ${escapeRegExp(parameter)}(?![\w$])\s*;?`,
    'g',
  );
}
