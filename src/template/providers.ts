/**
 * 内存 Provider 与组合 Provider
 */

import { posix } from 'path';
import type { ContentProvider, ProviderResult } from './types.js';

/**
 * 内存 Provider
 * 字符串值直接替换，其余值视为组件
 */
export class MapProvider implements ContentProvider {
  private entries: Map<string, unknown>;

  constructor(entries: Record<string, unknown> | Map<string, unknown> = {}) {
    this.entries = new Map();
    const source = entries instanceof Map ? entries : new Map(Object.entries(entries));
    for (const [path, value] of source) {
      this.set(path, value);
    }
  }

  set(path: string, value: unknown): this {
    this.entries.set(MapProvider.normalize(path), value);
    return this;
  }

  delete(path: string): boolean {
    return this.entries.delete(MapProvider.normalize(path));
  }

  lookup(path: string): ProviderResult {
    const key = MapProvider.normalize(path);
    if (!this.entries.has(key)) {
      return { status: 'unresolved' };
    }
    const value = this.entries.get(key);
    if (typeof value === 'string') {
      return { status: 'resolved', content: value };
    }
    return { status: 'component', value };
  }

  /**
   * 统一分隔符，去掉 ./ 前缀
   * @example normalize('./partials\\nav') => 'partials/nav'
   */
  private static normalize(path: string): string {
    return posix.normalize(path.replace(/\\/g, '/'));
  }
}

/**
 * 组合 Provider
 * 按顺序查找，返回第一个非 unresolved 的结果
 * 某个 Provider 抛错时继续尝试后面的；都未命中时抛出第一个错误
 */
export class ChainProvider implements ContentProvider {
  private providers: ContentProvider[];

  constructor(...providers: ContentProvider[]) {
    this.providers = providers;
  }

  add(provider: ContentProvider): this {
    this.providers.push(provider);
    return this;
  }

  lookup(path: string): ProviderResult {
    let firstError: unknown;
    let failed = false;
    for (const provider of this.providers) {
      try {
        const result = provider.lookup(path);
        if (result.status !== 'unresolved') {
          return result;
        }
      } catch (error) {
        if (!failed) {
          firstError = error;
          failed = true;
        }
      }
    }
    if (failed) {
      throw firstError;
    }
    return { status: 'unresolved' };
  }
}
