/**
 * 阶段 3：提取 n 参数变换函数
 *
 * 变体（默认顺序）：
 *   1. modern：查表式，去掉 `typeof` 短路守卫后直接返回
 *   2. legacy：无查表
 *   3. legacy-table：查表包装，需要全局声明
 *
 * 短路守卫引用 bundle 内的局部名，拼装前去掉；去掉后外层语句仍须合法。
 */

import { ExtractionError, ExtractionErrorCodes } from '../../utils/errors.js';
import type { StageOptions } from './DecipherExtractor.js';
import { resolveGlobalDeclaration } from './IndirectionTableExtractor.js';
import { legacyGuardPattern, matchFunctionParameter, matchNTransform, modernGuardPattern } from './patterns.js';
import { VariantRegistry } from './VariantRegistry.js';
import {
  matched,
  missed,
  type IndirectionTable,
  type NTransformFragment,
  type NTransformShapeKind,
  type StageOutcome,
  type VariantStrategy,
} from './types.js';

const STAGE = 'n-transform';

function notFound(kind: NTransformShapeKind): ExtractionError {
  return new ExtractionError(
    ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND,
    `N_TRANSFORM_${kind.toUpperCase().replace('-', '_')}`,
    `No ${kind} n-transform function found`,
  );
}

/**
 * 反复替换直到不再命中，保证对已清理的片段再执行一次是空操作
 */
function replaceUntilStable(source: string, pattern: RegExp, replacement: string): string {
  let current = source;
  for (;;) {
    const next = current.replace(pattern, replacement);
    if (next === current) {
      return current;
    }
    current = next;
  }
}

/**
 * 去掉新版短路守卫 `;if(typeof x==="undefined")return y;`，保留其后的分号
 */
export function stripModernGuard(fragment: string, tableName?: string): string {
  return replaceUntilStable(fragment, modernGuardPattern(tableName), '');
}

/**
 * 按参数名去掉旧版守卫 `if(typeof ...)return <param>;`，替换为空语句
 */
export function stripLegacyGuard(fragment: string, parameter: string): string {
  return replaceUntilStable(fragment, legacyGuardPattern(parameter), ';');
}

/**
 * 旧版片段：取出形参名再按名去守卫；取不到形参是硬失败，不能原样放过
 */
export function cleanLegacyNTransform(fragment: string): StageOutcome<string> {
  const parameter = matchFunctionParameter(fragment);
  if (parameter === undefined) {
    return missed(
      new ExtractionError(
        ExtractionErrorCodes.N_TRANSFORM_PARAMETER_NOT_FOUND,
        'FUNCTION_PARAMETER',
        'No single formal parameter found in the n-transform function',
      ),
    );
  }
  return matched(stripLegacyGuard(fragment, parameter));
}

export const modernVariant: VariantStrategy<NTransformFragment> = {
  name: 'modern',
  description: 'Table-driven n-transform with a try/catch fallback',
  extract({ bundle, table }) {
    const match = matchNTransform(bundle, 'modern');
    if (!match) {
      return missed(notFound('modern'));
    }

    // 守卫与全局声明都按函数头索引的表名确定
    const functionSource = stripModernGuard(match.source, match.tableName);
    const declaration = resolveGlobalDeclaration(bundle, functionSource, table, match.tableName);
    if (!declaration.matched) {
      return missed(declaration.error);
    }

    return matched({
      variant: 'modern',
      functionSource,
      declarations: [declaration.value.declarationSource],
      companions: [],
      tableName: declaration.value.variableName,
    });
  },
};

function legacyVariant(kind: 'legacy' | 'legacy-table', description: string): VariantStrategy<NTransformFragment> {
  return {
    name: kind,
    description,
    extract({ bundle, table }) {
      const match = matchNTransform(bundle, kind);
      if (!match) {
        return missed(notFound(kind));
      }

      const cleaned = cleanLegacyNTransform(match.source);
      if (!cleaned.matched) {
        return cleaned;
      }

      const fragment: NTransformFragment = {
        variant: kind,
        functionSource: cleaned.value,
        declarations: [],
        companions: [],
      };
      if (kind === 'legacy-table') {
        const declaration = resolveGlobalDeclaration(bundle, cleaned.value, table);
        if (!declaration.matched) {
          return missed(declaration.error);
        }
        fragment.declarations.push(declaration.value.declarationSource);
        fragment.tableName = declaration.value.variableName;
      }

      return matched(fragment);
    },
  };
}

export const legacyNTransformVariant = legacyVariant('legacy', 'Legacy n-transform without table indirection');
export const legacyTableNTransformVariant = legacyVariant('legacy-table', 'Legacy n-transform wrapped in table lookups');

export function createNTransformRegistry(): VariantRegistry<NTransformFragment> {
  return new VariantRegistry<NTransformFragment>(STAGE, () =>
    new ExtractionError(ExtractionErrorCodes.N_TRANSFORM_NOT_FOUND, 'N_TRANSFORM', 'No n-transform variant configured'),
  )
    .register(modernVariant)
    .register(legacyNTransformVariant)
    .register(legacyTableNTransformVariant);
}

const defaultRegistry = createNTransformRegistry();

export function extractNTransformFragment(
  bundle: string,
  table?: IndirectionTable,
  options: StageOptions<NTransformFragment> = {},
): StageOutcome<NTransformFragment> {
  const registry = options.registry ?? defaultRegistry;
  return registry.run({ bundle, table }, options.order);
}
