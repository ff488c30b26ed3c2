/**
 * 阶段 1：定位间接查找表
 *
 * 新版混淆把辅助方法名、split/join 参数集中到一个全局字符串表里，
 * 旧版没有。找不到不是错误，只说明 bundle 使用旧布局。
 */

import { ExtractionError, ExtractionErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { matchGlobalDeclaration, matchIndirectionTable } from './patterns.js';
import { matched, missed, type IndirectionTable, type StageOutcome } from './types.js';

export function extractIndirectionTable(bundle: string): IndirectionTable | undefined {
  const table = matchIndirectionTable(bundle);
  if (!table) {
    logger.debug('No indirection table declaration found, assuming legacy layout', {
      code: ExtractionErrorCodes.INDIRECTION_TABLE_MATCH_FAILED,
      shape: 'INDIRECTION_TABLE',
    });
    return undefined;
  }

  logger.debug(`Indirection table found: ${table.variableName}`);
  return table;
}

/**
 * 片段是否以 `NAME[` 的形式引用了该表
 */
export function referencesTable(fragment: string, table: IndirectionTable | undefined): boolean {
  if (!table) {
    return false;
  }
  const name = table.variableName;
  let from = fragment.indexOf(`${name}[`);
  while (from !== -1) {
    const before = fragment[from - 1] ?? '';
    if (!/[\w$.]/.test(before)) {
      return true;
    }
    from = fragment.indexOf(`${name}[`, from + 1);
  }
  return false;
}

/**
 * 取查表式片段依赖的全局声明。
 * 片段引用的是阶段 1 找到的表时直接复用它，否则在 bundle 中查找
 * （给了 referencedName 就按名查找，否则取第一个符合形状的声明）。
 */
export function resolveGlobalDeclaration(
  bundle: string,
  fragment: string,
  table: IndirectionTable | undefined,
  referencedName?: string,
): StageOutcome<IndirectionTable> {
  const usesTable =
    referencedName === undefined ? referencesTable(fragment, table) : referencedName === table?.variableName;
  if (table && usesTable) {
    return matched(table);
  }

  const declaration = matchGlobalDeclaration(bundle, referencedName);
  if (!declaration) {
    return missed(
      new ExtractionError(
        ExtractionErrorCodes.GLOBAL_DECLARATIONS_NOT_FOUND,
        'GLOBAL_VARIABLE_DECLARATION',
        referencedName === undefined
          ? 'No global split-string or string-array declaration found'
          : `No global declaration found for ${referencedName}`,
        referencedName === undefined ? undefined : { referencedName },
      ),
    );
  }
  return matched({ variableName: declaration.variableName, declarationSource: declaration.source });
}
