/**
 * 页面模板系统 - 核心类型定义
 */

import type { ScriptSandbox } from '../script/sandbox.js';

/**
 * 渲染环境 - 调用方提供的嵌套映射
 * render 会在其上挂载 Page.Content
 */
export type Environment = Record<string, unknown>;

/**
 * Provider 查找结果
 * - resolved: 得到可直接替换的文本
 * - component: 找到了，但不是字符串（不参与替换）
 * - unresolved: 未找到
 */
export type ProviderResult =
  | { status: 'resolved'; content: string }
  | { status: 'component'; value: unknown }
  | { status: 'unresolved' };

/**
 * 内容 Provider - 按路径提供可替换内容
 */
export interface ContentProvider {
  lookup(path: string): ProviderResult;
}

/**
 * 解析器配置
 */
export interface ResolverOptions {
  /** Provider 基础目录，默认 '.' */
  providerDir?: string;
  /** 第三阶段使用的 Provider，不传则跳过该阶段 */
  provider?: ContentProvider;
  /** 每次 render 创建一个新的脚本沙箱 */
  createSandbox?: () => ScriptSandbox;
  /** 输出调试日志，默认 false */
  debug?: boolean;
}

/**
 * 模板相关错误
 */
export class TemplateError extends Error {
  constructor(
    message: string,
    public code:
      | 'FILE_NOT_FOUND'
      | 'INVALID_PATH'
      | 'READ_ERROR'
      | 'INVALID_CONFIG'
      | 'PROVIDER_ERROR'
      | 'SANDBOX_CLOSED',
    public path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TemplateError';
  }
}
