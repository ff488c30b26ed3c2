/**
 * 安全的 JSON 序列化
 *
 * 功能：
 * - 处理循环引用
 * - 处理 BigInt
 * - 处理特殊对象（Error、RegExp）
 * - 序列化失败时返回错误描述而不是抛出
 */

/**
 * 安全的 JSON.stringify
 *
 * @param data 要序列化的数据
 * @param space 缩进空格数（可选）
 * @param maxDepth 最大深度（默认10）
 */
export function safeStringify(data: unknown, space?: number, maxDepth = 10): string {
  const seen = new WeakSet<object>();
  const depths = new WeakMap<object, number>();

  function replacer(this: unknown, _key: string, value: unknown): unknown {
    if (value === undefined) {
      return '[undefined]';
    }

    if (typeof value === 'bigint') {
      return `[BigInt: ${value.toString()}]`;
    }

    if (typeof value === 'function') {
      return `[Function: ${value.name || 'anonymous'}]`;
    }

    if (typeof value === 'symbol') {
      return `[Symbol: ${value.toString()}]`;
    }

    if (value instanceof Error) {
      const extra: Record<string, unknown> = {};
      for (const key of Object.keys(value)) {
        extra[key] = Reflect.get(value, key);
      }
      return {
        __type: 'Error',
        name: value.name,
        message: value.message,
        ...extra,
      };
    }

    if (value instanceof RegExp) {
      return {
        __type: 'RegExp',
        source: value.source,
        flags: value.flags,
      };
    }

    if (value !== null && typeof value === 'object') {
      // 深度 = 父对象深度 + 1
      const parentDepth = this !== null && typeof this === 'object' ? depths.get(this) ?? 0 : 0;
      const depth = parentDepth + 1;
      if (depth > maxDepth) {
        return '[Max depth exceeded]';
      }

      if (seen.has(value)) {
        return '[Circular Reference]';
      }
      seen.add(value);
      depths.set(value, depth);
    }

    return value;
  }

  try {
    return JSON.stringify(data, replacer, space);
  } catch (error) {
    return `[Serialization Error: ${error instanceof Error ? error.message : String(error)}]`;
  }
}
