/**
 * 占位符解析器
 *
 * 语法：{#:body:#}
 *
 * 每个占位符按以下顺序解析，先成功者生效：
 * 1. 环境路径查找：body 按点号拆分后在 env 中逐级访问
 * 2. Lua 脚本：body 以 lua:: 开头时执行其余部分，env 作为唯一参数
 * 3. Provider：取 | 之前的部分，点号换成 /，拼接 providerDir 后查找
 * 4. 兜底：输出 <pre>LUA:UNDEFIND:'body'</pre>
 *
 * 单次线性扫描，替换结果不会被再次解析
 */

import { join } from 'path';
import { ensurePage, getPath, splitPath, stringifyValue } from '../core/environment.js';
import { LuaSandbox } from '../script/sandbox.js';
import type { ScriptSandbox } from '../script/sandbox.js';
import type { ContentProvider, Environment, ResolverOptions } from './types.js';

/** 脚本前缀 */
export const SCRIPT_PREFIX = 'lua::';

/** 查到该值时视为未找到 */
const ENV_SENTINEL = 'env';

/**
 * 诊断文本
 * 拼写 UNDEFIND 保持原样，已有页面依赖该输出
 */
export const Diagnostics = {
  parseError: (error: string) =>
    `<pre>Lua:An error occur on parsing luascript\nerror was . . .\n${error}</pre>`,
  executionError: (error: string) =>
    `<pre>Lua:An error occur on executing luascript\nerror was . . .\n${error}</pre>`,
  unresolved: (body: string) => `<pre>LUA:UNDEFIND:'${body}'</pre>`,
};

/**
 * 单次 render 的沙箱，首次执行脚本时才创建
 */
class RenderSession {
  private current: ScriptSandbox | null = null;

  constructor(private factory: () => ScriptSandbox) {}

  sandbox(): ScriptSandbox {
    this.current ??= this.factory();
    return this.current;
  }

  close(): void {
    this.current?.close();
    this.current = null;
  }
}

/**
 * 占位符解析器
 */
export class PlaceholderResolver {
  private static readonly PATTERN = /\{#:([\s\S]+?):#\}/g;

  private providerDir: string;
  private provider: ContentProvider | undefined;
  private createSandbox: () => ScriptSandbox;
  private debug: boolean;

  constructor(options: ResolverOptions = {}) {
    this.providerDir = options.providerDir ?? '.';
    this.provider = options.provider;
    this.createSandbox = options.createSandbox ?? (() => new LuaSandbox());
    this.debug = options.debug ?? false;
  }

  /**
   * 渲染内容
   * env 会被修改：确保存在 Page，并写入 Page.Content
   * @returns 所有占位符替换后的内容
   */
  render(content: string, environment?: Environment): string {
    const env = environment ?? {};
    ensurePage(env, content);

    const session = new RenderSession(this.createSandbox);
    try {
      return content.replace(PlaceholderResolver.PATTERN, (_, body: string) =>
        this.resolve(body, env, session)
      );
    } finally {
      session.close();
    }
  }

  /**
   * 解析单个占位符
   */
  private resolve(body: string, env: Environment, session: RenderSession): string {
    // 1. 环境路径
    const found = getPath(env, splitPath(body));
    if (found.found && found.value !== ENV_SENTINEL) {
      return stringifyValue(found.value);
    }

    // 2. Lua 脚本
    if (body.startsWith(SCRIPT_PREFIX)) {
      return this.runScript(body.slice(SCRIPT_PREFIX.length), env, session.sandbox());
    }

    // 3. Provider
    const provided = this.lookupProvider(body);
    if (provided !== null) {
      return provided;
    }

    // 4. 兜底
    return Diagnostics.unresolved(body);
  }

  private runScript(code: string, env: Environment, sandbox: ScriptSandbox): string {
    const parsed = sandbox.parse(code);
    if (!parsed.ok) {
      return Diagnostics.parseError(parsed.error);
    }
    const result = sandbox.execute(parsed.fragment, env);
    if (!result.ok) {
      return Diagnostics.executionError(result.error);
    }
    return result.value.text;
  }

  /**
   * 查找 Provider
   * 非字符串结果、未找到、查找出错都返回 null
   */
  private lookupProvider(body: string): string | null {
    if (!this.provider) {
      return null;
    }

    const pipeIndex = body.indexOf('|');
    const name = pipeIndex === -1 ? body : body.slice(0, pipeIndex);
    if (!name) {
      return null;
    }

    const path = join(this.providerDir, name.replace(/\./g, '/'));
    try {
      const result = this.provider.lookup(path);
      if (result.status === 'resolved') {
        return result.content;
      }
      if (this.debug && result.status === 'component') {
        console.debug(`[Resolver] Provider "${path}" returned a non-string value, skipped`);
      }
    } catch (error) {
      if (this.debug) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[Resolver] Provider lookup failed for "${path}": ${message}`);
      }
    }
    return null;
  }

  /**
   * 获取内容中的占位符（去重，按首次出现顺序）
   */
  static extractPlaceholders(content: string): string[] {
    const bodies = new Set<string>();
    for (const match of content.matchAll(PlaceholderResolver.PATTERN)) {
      bodies.add(match[1]);
    }
    return Array.from(bodies);
  }
}

/**
 * 快捷函数：单次渲染
 * @example
 * renderPage('Hi {#:user.name:#}', { user: { name: 'Ada' } }) => 'Hi Ada'
 */
export function renderPage(
  content: string,
  environment?: Environment,
  options?: ResolverOptions
): string {
  const resolver = new PlaceholderResolver(options);
  return resolver.render(content, environment);
}
