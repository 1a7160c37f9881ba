/**
 * 文件 Provider
 * 按路径在文件系统中查找内容：.lua 模块执行后取返回值，文本文件直接读取
 */

import { readFileSync, existsSync, statSync } from 'fs';
import { resolve, isAbsolute } from 'path';
import { globSync } from 'glob';
import { LuaSandbox } from '../script/sandbox.js';
import type { ScriptSandbox } from '../script/sandbox.js';
import { TemplateError } from './types.js';
import type { ContentProvider, ProviderResult } from './types.js';

/** 查找顺序：Lua 模块优先，其次是文本 */
const DEFAULT_EXTENSIONS = ['.lua', '.html', '.md', '.txt'];

export interface FileProviderOptions {
  /** 相对路径的基准目录，默认 process.cwd() */
  rootDir?: string;
  /** 依次尝试的扩展名 */
  extensions?: string[];
  /** 执行 .lua 模块用的沙箱 */
  createSandbox?: () => ScriptSandbox;
}

/**
 * 文件 Provider
 */
export class FileProvider implements ContentProvider {
  private rootDir: string;
  private extensions: string[];
  private createSandbox: () => ScriptSandbox;

  constructor(options: FileProviderOptions = {}) {
    this.rootDir = options.rootDir ?? process.cwd();
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    this.createSandbox = options.createSandbox ?? (() => new LuaSandbox());
  }

  /**
   * 查找内容
   * @throws TemplateError 文件读取失败或模块执行出错
   */
  lookup(path: string): ProviderResult {
    const file = this.resolvePath(path);
    if (!file) {
      return { status: 'unresolved' };
    }
    if (file.endsWith('.lua')) {
      return this.runModule(file);
    }
    return { status: 'resolved', content: this.read(file) };
  }

  /**
   * 解析为实际存在的文件
   * 先按扩展名逐个尝试，最后尝试路径本身
   * @returns 绝对路径，找不到返回 null
   */
  resolvePath(path: string): string | null {
    const base = isAbsolute(path) ? path : resolve(this.rootDir, path);

    for (const ext of this.extensions) {
      if (this.fileExists(base + ext)) {
        return base + ext;
      }
    }
    if (this.fileExists(base)) {
      return base;
    }
    return null;
  }

  /**
   * 列出目录下可用的 Provider 名称（点号分隔，不含扩展名）
   * @example list('partials') => ['footer', 'nav.main']
   */
  list(dir: string = '.'): string[] {
    const cwd = isAbsolute(dir) ? dir : resolve(this.rootDir, dir);
    const patterns = this.extensions.map(ext => `**/*${ext}`);
    const matches = globSync(patterns, {
      cwd,
      nodir: true,
      windowsPathsNoEscape: true,
    });

    const names = new Set<string>();
    for (const match of matches) {
      const ext = this.extensions.find(e => match.endsWith(e));
      const stem = ext ? match.slice(0, -ext.length) : match;
      names.add(stem.replace(/\\/g, '/').split('/').join('.'));
    }
    return Array.from(names).sort();
  }

  /**
   * 执行 Lua 模块
   * 返回字符串时作为内容，其余返回值作为组件
   */
  private runModule(file: string): ProviderResult {
    const source = this.read(file);
    const sandbox = this.createSandbox();
    try {
      const parsed = sandbox.parse(source, `@${file}`);
      if (!parsed.ok) {
        throw new TemplateError(`Failed to parse provider module: ${parsed.error}`, 'PROVIDER_ERROR', file);
      }
      const result = sandbox.execute(parsed.fragment);
      if (!result.ok) {
        throw new TemplateError(`Provider module raised an error: ${result.error}`, 'PROVIDER_ERROR', file);
      }
      if (result.value.type === 'string') {
        return { status: 'resolved', content: result.value.text };
      }
      return { status: 'component', value: result.value };
    } finally {
      sandbox.close();
    }
  }

  private read(file: string): string {
    try {
      return readFileSync(file, 'utf-8');
    } catch (err) {
      throw new TemplateError(`Failed to read provider file: ${file}`, 'READ_ERROR', file, { cause: err });
    }
  }

  private fileExists(path: string): boolean {
    return existsSync(path) && statSync(path).isFile();
  }
}
