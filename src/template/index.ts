/**
 * 页面模板系统
 */

// 类型定义
export type {
  Environment,
  ProviderResult,
  ContentProvider,
  ResolverOptions,
} from './types.js';

export { TemplateError } from './types.js';

// 核心组件
export { PlaceholderResolver, renderPage, Diagnostics, SCRIPT_PREFIX } from './resolver.js';
export { FileProvider } from './loader.js';
export type { FileProviderOptions } from './loader.js';
export { MapProvider, ChainProvider } from './providers.js';
