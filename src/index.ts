/**
 * pageweave - 页面占位符渲染
 *
 * 所有导出都在这里，一目了然
 */

// 模板系统
export * from './template/index.js';

// 脚本沙箱
export { LuaSandbox, runScript } from './script/sandbox.js';

// 环境工具
export { getPath, splitPath, ensurePage, stringifyValue, isMapping } from './core/environment.js';

// 配置
export {
  loadConfig,
  loadConfigSync,
  listConfigs,
  parseConfig,
  createResolverFromConfig,
} from './core/config.js';

// 类型
export type {
  ScriptSandbox,
  ScriptFragment,
  ScriptValue,
  ParseResult,
  ExecuteResult,
} from './script/sandbox.js';

export type { PathLookup } from './core/environment.js';

export type { RendererConfigFile } from './core/config.js';
