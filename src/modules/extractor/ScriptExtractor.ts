/**
 * 解码脚本提取主管线
 *
 * 顺序执行三个阶段，任一阶段失败即整体失败，不返回部分结果：
 *   1. IndirectionTableExtractor：定位间接查找表（可缺省）
 *   2. DecipherExtractor：签名解密函数
 *   3. NTransformExtractor：n 参数变换函数
 * 最后由 ScriptAssembler 按规范名拼装。
 *
 * 设计原则：
 *   - 匹配前先校验输入类型与大小上限
 *   - 变体尝试顺序可按实例、按调用或经环境变量调整，显式参数优先
 *   - 每个实例持有自己的变体注册表，追加变体不影响其他实例
 */

import { getExtractorConfig, isValidBundleSize } from '../../utils/config.js';
import { ExtractionError, ExtractionErrorCodes, formatError, isExtractionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createDecipherRegistry } from './DecipherExtractor.js';
import { extractIndirectionTable } from './IndirectionTableExtractor.js';
import { createNTransformRegistry } from './NTransformExtractor.js';
import { assembleScript } from './ScriptAssembler.js';
import type { VariantRegistry } from './VariantRegistry.js';
import type {
  DecipherFragment,
  ExtractionResult,
  ExtractOptions,
  NTransformFragment,
  StageOutcome,
} from './types.js';

// ==================== 选项 ====================

export interface ScriptExtractorOptions extends ExtractOptions {
  decipherRegistry?: VariantRegistry<DecipherFragment>;
  nTransformRegistry?: VariantRegistry<NTransformFragment>;
}

function nonEmpty(list: readonly string[] | undefined): readonly string[] | undefined {
  return list && list.length > 0 ? list : undefined;
}

function unwrap<T>(outcome: StageOutcome<T>): T {
  if (!outcome.matched) {
    throw outcome.error;
  }
  return outcome.value;
}

function checkMaxBundleSize(value: number): number {
  if (!isValidBundleSize(value)) {
    throw new Error(`Invalid maxBundleSize: ${value}. Must be a positive integer.`);
  }
  return value;
}

function malformed(message: string, context?: Record<string, unknown>): ExtractionError {
  return new ExtractionError(ExtractionErrorCodes.MALFORMED_OR_OVERSIZED_BUNDLE, 'BUNDLE', message, context);
}

// ==================== 主类 ====================

export class ScriptExtractor {
  readonly decipherRegistry: VariantRegistry<DecipherFragment>;
  readonly nTransformRegistry: VariantRegistry<NTransformFragment>;

  private readonly maxBundleSize: number;
  private readonly decipherOrder?: readonly string[];
  private readonly nTransformOrder?: readonly string[];

  constructor(options: ScriptExtractorOptions = {}) {
    const config = getExtractorConfig();
    this.decipherRegistry = options.decipherRegistry ?? createDecipherRegistry();
    this.nTransformRegistry = options.nTransformRegistry ?? createNTransformRegistry();
    this.maxBundleSize = checkMaxBundleSize(options.maxBundleSize ?? config.maxBundleSize);
    this.decipherOrder = nonEmpty(options.decipherVariants) ?? nonEmpty(config.decipherVariants);
    this.nTransformOrder = nonEmpty(options.nTransformVariants) ?? nonEmpty(config.nTransformVariants);
  }

  // ==================== 公共 API ====================

  /**
   * 提取解码脚本。提取失败以结果值返回；配置错误（例如未知变体名、非法大小上限）照常抛出
   */
  extract(bundle: unknown, options: ExtractOptions = {}): ExtractionResult {
    const startTime = Date.now();
    const maxBundleSize = checkMaxBundleSize(options.maxBundleSize ?? this.maxBundleSize);

    try {
      const source = this.validateBundle(bundle, maxBundleSize);

      const table = extractIndirectionTable(source);
      const decipher = unwrap(
        this.decipherRegistry.run({ bundle: source, table }, nonEmpty(options.decipherVariants) ?? this.decipherOrder),
      );
      const nTransform = unwrap(
        this.nTransformRegistry.run(
          { bundle: source, table },
          nonEmpty(options.nTransformVariants) ?? this.nTransformOrder,
        ),
      );

      const script = assembleScript(decipher, nTransform, table);
      const indirectionTable = decipher.tableName ?? nTransform.tableName;
      const durationMs = Date.now() - startTime;

      logger.success(
        `Decode script extracted in ${durationMs}ms (decipher: ${decipher.variant}, n-transform: ${nTransform.variant})`,
      );

      return {
        success: true,
        script,
        report: {
          decipherVariant: decipher.variant,
          nTransformVariant: nTransform.variant,
          ...(indirectionTable !== undefined ? { indirectionTable } : {}),
          durationMs,
        },
      };
    } catch (error) {
      if (!isExtractionError(error)) {
        throw error;
      }
      logger.warn('Decode script extraction failed', formatError(error));
      return { success: false, error };
    }
  }

  /**
   * 同 extract，失败时抛出 ExtractionError
   */
  extractOrThrow(bundle: unknown, options: ExtractOptions = {}): string {
    const result = this.extract(bundle, options);
    if (!result.success) {
      throw result.error;
    }
    return result.script;
  }

  // ==================== 输入校验 ====================

  private validateBundle(bundle: unknown, maxBundleSize: number): string {
    if (typeof bundle !== 'string') {
      throw malformed(`Bundle must be a string, got ${bundle === null ? 'null' : typeof bundle}`);
    }
    if (bundle.length > maxBundleSize) {
      throw malformed(`Bundle exceeds maximum size of ${maxBundleSize} characters`, {
        size: bundle.length,
        maxBundleSize,
      });
    }
    if (bundle.trim().length === 0) {
      throw malformed('Bundle is empty');
    }
    return bundle;
  }
}

// ==================== 便捷入口 ====================

export function extractDecodeScript(bundle: unknown, options: ScriptExtractorOptions = {}): ExtractionResult {
  return new ScriptExtractor(options).extract(bundle);
}

export function extractDecodeScriptOrThrow(bundle: unknown, options: ScriptExtractorOptions = {}): string {
  return new ScriptExtractor(options).extractOrThrow(bundle);
}
