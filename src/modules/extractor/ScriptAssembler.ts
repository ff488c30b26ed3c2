/**
 * 拼装最终脚本
 *
 * 输出顺序：全局声明（间接表在前，去重）→ 伴随对象 → 两个规范名绑定。
 * 每条语句独占一行并以分号结尾。
 */

import {
  CANONICAL_NAMES,
  type DecipherFragment,
  type IndirectionTable,
  type NTransformFragment,
  type ScriptFragment,
} from './types.js';

function withoutTrailingSemicolon(source: string): string {
  return source.trim().replace(/;+$/, '').trimEnd();
}

function terminated(statement: string): string {
  return `${withoutTrailingSemicolon(statement)};`;
}

/**
 * 合并两段片段的全局声明；给定的间接表若被使用则排第一
 */
export function collectDeclarations(fragments: readonly ScriptFragment[], table?: IndirectionTable): string[] {
  const seen = new Set<string>();
  const ordered: string[] = [];
  for (const fragment of fragments) {
    for (const declaration of fragment.declarations) {
      const normalized = withoutTrailingSemicolon(declaration);
      if (!seen.has(normalized)) {
        seen.add(normalized);
        ordered.push(normalized);
      }
    }
  }

  const tableSource = table ? withoutTrailingSemicolon(table.declarationSource) : undefined;
  if (tableSource !== undefined && seen.has(tableSource)) {
    return [tableSource, ...ordered.filter((declaration) => declaration !== tableSource)];
  }
  return ordered;
}

export function assembleScript(
  decipher: DecipherFragment,
  nTransform: NTransformFragment,
  table?: IndirectionTable,
): string {
  const statements = [
    ...collectDeclarations([decipher, nTransform], table).map(terminated),
    ...[...decipher.companions, ...nTransform.companions].map(terminated),
    `var ${CANONICAL_NAMES.decipher}=${withoutTrailingSemicolon(decipher.functionSource)};`,
    `var ${CANONICAL_NAMES.nTransform}=${withoutTrailingSemicolon(nTransform.functionSource)};`,
  ];
  return statements.join('\n');
}
