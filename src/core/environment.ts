/**
 * 渲染环境工具
 *
 * - isMapping: 判断值是否可以继续按 key 访问
 * - getPath: 按路径段逐级访问（只走自有属性）
 * - ensurePage: 挂载 Page.Content
 * - stringifyValue: 把查到的值转成替换文本
 */

import type { Environment } from '../template/types.js';

/** 查找结果：found 为 false 表示路径中断 */
export type PathLookup = { found: true; value: unknown } | { found: false };

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * 拆分点号路径，空段会被跳过
 * @example splitPath('a..b') => ['a', 'b']
 */
export function splitPath(path: string): string[] {
  return path.split('.').filter(segment => segment.length > 0);
}

/**
 * 逐级访问嵌套映射
 * 当前值不是映射时中断；null/undefined 的结果视为未找到
 * @example getPath({a: {b: 1}}, ['a', 'b']) => { found: true, value: 1 }
 */
export function getPath(root: unknown, segments: string[]): PathLookup {
  if (segments.length === 0) {
    return { found: false };
  }

  let current: unknown = root;
  for (const segment of segments) {
    if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return { found: false };
    }
    current = current[segment];
  }

  if (current === undefined || current === null) {
    return { found: false };
  }
  return { found: true, value: current };
}

/**
 * 确保 env.Page 是映射，并写入 Page.Content
 */
export function ensurePage(env: Environment, content: string): Record<string, unknown> {
  const existing = env.Page;
  const page = isMapping(existing) ? existing : {};
  env.Page = page;
  page.Content = content;
  return page;
}

/**
 * 值转文本
 * 映射和数组走 JSON，无法序列化时退回 String()
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (isMapping(value)) {
    try {
      const json = JSON.stringify(value);
      if (json !== undefined) return json;
    } catch {
      // 循环引用
    }
  }
  return String(value);
}
