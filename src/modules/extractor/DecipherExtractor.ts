/**
 * 阶段 2：提取签名解密函数
 *
 * 变体（默认顺序）：
 *   1. action-object：查表式驱动函数 + 三方法 action object，命中即返回
 *   2. helper-object：经典 helper 对象（需含已识别的数组操作）+ 驱动函数，
 *      驱动函数依次尝试 direct → table-split → table-indexed，查表式需要全局声明
 */

import { ExtractionError, ExtractionErrorCodes } from '../../utils/errors.js';
import { resolveGlobalDeclaration } from './IndirectionTableExtractor.js';
import { findHelperOperations, matchActionObject, matchDecipherDriver, matchHelperObject } from './patterns.js';
import { VariantRegistry } from './VariantRegistry.js';
import {
  matched,
  missed,
  type ArrayHelperOperation,
  type DecipherDriverKind,
  type DecipherFragment,
  type HelperObjectMatch,
  type IndirectionTable,
  type StageOutcome,
  type VariantStrategy,
} from './types.js';

const STAGE = 'decipher';

/** Driver shapes tried after a helper object matched, in order. */
const HELPER_DRIVER_CASCADE: readonly DecipherDriverKind[] = ['direct', 'table-split', 'table-indexed'];

function driverNotFound(shape: string, message: string): ExtractionError {
  return new ExtractionError(ExtractionErrorCodes.DECIPHER_DRIVER_NOT_FOUND, shape, message);
}

/**
 * 校验 helper 对象至少含一种已识别的数组操作，区分真正的签名 helper 与无关对象
 */
export function validateHelperObject(
  helper: HelperObjectMatch,
): StageOutcome<Partial<Record<ArrayHelperOperation, string>>> {
  const operations = findHelperOperations(helper.body);
  if (Object.keys(operations).length === 0) {
    return missed(
      new ExtractionError(
        ExtractionErrorCodes.HELPER_OBJECT_HAS_NO_RECOGNIZED_OPERATIONS,
        'ARRAY_HELPER_OPERATION',
        `Helper object ${helper.name} contains no recognized array operation`,
        { helper: helper.name },
      ),
    );
  }
  return matched(operations);
}

export const actionObjectVariant: VariantStrategy<DecipherFragment> = {
  name: 'action-object',
  description: 'Table-indexed driver with a three-method action object',
  extract({ bundle, table }) {
    const driver = matchDecipherDriver(bundle, 'table-indexed');
    if (!driver) {
      return missed(driverNotFound('DECIPHER_DRIVER_TABLE_INDEXED', 'No table-indexed decipher driver found'));
    }

    const actions = matchActionObject(bundle, driver.objectName);
    if (!actions) {
      return missed(
        new ExtractionError(
          ExtractionErrorCodes.HELPER_OBJECT_NOT_FOUND,
          'ACTION_OBJECT',
          `No three-method action object found for ${driver.objectName ?? 'driver'}`,
          { objectName: driver.objectName },
        ),
      );
    }

    const declaration = resolveGlobalDeclaration(bundle, driver.source, table, driver.tableName);
    if (!declaration.matched) {
      return missed(declaration.error);
    }

    return matched({
      variant: 'action-object',
      functionSource: driver.source,
      declarations: [declaration.value.declarationSource],
      companions: [actions.source],
      tableName: declaration.value.variableName,
    });
  },
};

export const helperObjectVariant: VariantStrategy<DecipherFragment> = {
  name: 'helper-object',
  description: 'Helper object of array operations with a direct or table-driven driver',
  extract({ bundle, table }) {
    const helper = matchHelperObject(bundle);
    if (!helper) {
      return missed(
        new ExtractionError(
          ExtractionErrorCodes.HELPER_OBJECT_NOT_FOUND,
          'HELPER_OBJECT',
          'No helper object of array operations found',
        ),
      );
    }

    const operations = validateHelperObject(helper);
    if (!operations.matched) {
      return missed(operations.error);
    }

    for (const kind of HELPER_DRIVER_CASCADE) {
      const driver = matchDecipherDriver(bundle, kind);
      if (!driver) {
        continue;
      }

      const fragment: DecipherFragment = {
        variant: 'helper-object',
        functionSource: driver.source,
        declarations: [],
        companions: [helper.source],
      };
      if (kind !== 'direct') {
        const declaration = resolveGlobalDeclaration(bundle, driver.source, table, driver.tableName);
        if (!declaration.matched) {
          return missed(declaration.error);
        }
        fragment.declarations.push(declaration.value.declarationSource);
        fragment.tableName = declaration.value.variableName;
      }

      return matched(fragment);
    }

    return missed(
      driverNotFound('DECIPHER_DRIVER', `No decipher driver found for helper object ${helper.name}`),
    );
  },
};

export function createDecipherRegistry(): VariantRegistry<DecipherFragment> {
  return new VariantRegistry<DecipherFragment>(STAGE, () =>
    driverNotFound('DECIPHER_DRIVER', 'No decipher variant configured'),
  )
    .register(actionObjectVariant)
    .register(helperObjectVariant);
}

const defaultRegistry = createDecipherRegistry();

export interface StageOptions<T> {
  /** Variant names in the order to try. */
  order?: readonly string[];
  registry?: VariantRegistry<T>;
}

export function extractDecipherFragment(
  bundle: string,
  table?: IndirectionTable,
  options: StageOptions<DecipherFragment> = {},
): StageOutcome<DecipherFragment> {
  const registry = options.registry ?? defaultRegistry;
  return registry.run({ bundle, table }, options.order);
}
