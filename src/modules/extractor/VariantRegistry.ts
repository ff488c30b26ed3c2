/**
 * VariantRegistry：混淆变体注册表
 *
 * 设计理念：
 * - 每种混淆变体是一个策略，描述如何从 bundle 中取出该阶段的片段
 * - 按注册顺序依次尝试，首个命中即返回（责任链）
 * - 新变体直接追加注册，不需要改动已有策略
 * - 尝试顺序是可调策略，可在调用时按名称重排
 */

import { ExtractionError, type ExtractionErrorCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ExtractionContext, StageOutcome, VariantStrategy } from './types.js';

export interface CascadeFailure {
  variant: string;
  code: ExtractionErrorCode;
  shape: string;
}

export class VariantRegistry<T> {
  private strategies: Map<string, VariantStrategy<T>> = new Map();

  /**
   * @param stage - 阶段名，用于日志与错误信息
   * @param emptyFailure - 没有可尝试的策略时返回的错误
   */
  constructor(
    readonly stage: string,
    private readonly emptyFailure: () => ExtractionError,
  ) {}

  /** 注册（追加）一个变体策略 */
  register(strategy: VariantStrategy<T>): this {
    if (this.strategies.has(strategy.name)) {
      logger.warn(`[VariantRegistry] Overwriting ${this.stage} variant: ${strategy.name}`);
    }
    this.strategies.set(strategy.name, strategy);
    return this;
  }

  get(name: string): VariantStrategy<T> | undefined {
    return this.strategies.get(name);
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  /** 按注册顺序列出 */
  list(): VariantStrategy<T>[] {
    return Array.from(this.strategies.values());
  }

  names(): string[] {
    return Array.from(this.strategies.keys());
  }

  unregister(name: string): boolean {
    return this.strategies.delete(name);
  }

  /**
   * 按给定名称顺序取策略；不传则用注册顺序
   */
  ordered(names?: readonly string[]): VariantStrategy<T>[] {
    if (names === undefined || names.length === 0) {
      return this.list();
    }
    return names.map((name) => {
      const strategy = this.strategies.get(name);
      if (!strategy) {
        throw new Error(`Unknown ${this.stage} variant: ${name}`);
      }
      return strategy;
    });
  }

  /**
   * 依次尝试各变体，返回首个命中。
   * 全部失败时返回最后一个失败，前面各次失败附在 context.attempts 中。
   */
  run(context: ExtractionContext, order?: readonly string[]): StageOutcome<T> {
    const attempts: CascadeFailure[] = [];
    let lastError: ExtractionError | undefined;

    for (const strategy of this.ordered(order)) {
      const outcome = strategy.extract(context);
      if (outcome.matched) {
        logger.debug(`${this.stage}: matched variant "${strategy.name}"`);
        return outcome;
      }
      logger.debug(`${this.stage}: variant "${strategy.name}" missed`, {
        code: outcome.error.code,
        shape: outcome.error.shape,
      });
      attempts.push({ variant: strategy.name, code: outcome.error.code, shape: outcome.error.shape });
      lastError = outcome.error;
    }

    if (!lastError) {
      return { matched: false, error: this.emptyFailure() };
    }

    return {
      matched: false,
      error: new ExtractionError(lastError.code, lastError.shape, lastError.message, {
        ...lastError.context,
        stage: this.stage,
        attempts,
      }),
    };
  }
}
