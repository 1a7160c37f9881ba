/**
 * 配置加载
 * 从 config 目录读取 JSON 配置文件
 *
 * 提供两种方式：
 * - loadConfig() - 异步加载
 * - loadConfigSync() - 同步加载（推荐，用于构造 Resolver）
 */

import { readFile, readdir } from 'fs/promises';
import { readFileSync } from 'fs';
import { resolve, dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { TemplateError } from '../template/types.js';
import { PlaceholderResolver } from '../template/resolver.js';
import { FileProvider } from '../template/loader.js';

/**
 * 配置文件类型
 */
export interface RendererConfigFile {
  /** Provider 基础目录 */
  providerDir: string;
  /** 输出调试日志 */
  debug: boolean;
}

const DEFAULTS: RendererConfigFile = {
  providerDir: '.',
  debug: false,
};

/**
 * 获取默认配置目录（项目根目录下的 config）
 */
function getConfigDir(): string {
  const __filename = fileURLToPath(import.meta.url);
  return join(resolve(dirname(__filename), '../..'), 'config');
}

/**
 * 读取配置文件（异步版本）
 * @param name 配置文件名（不含路径和扩展名），默认 'default'
 */
export async function loadConfig(
  name: string = 'default',
  configDir: string = getConfigDir()
): Promise<RendererConfigFile> {
  const configPath = resolve(configDir, `${name}.json`);
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw readError(configPath, err);
  }
  return parseConfig(content, configPath);
}

/**
 * 读取配置文件（同步版本）
 * @param name 配置文件名（不含路径和扩展名），默认 'default'
 */
export function loadConfigSync(
  name: string = 'default',
  configDir: string = getConfigDir()
): RendererConfigFile {
  const configPath = resolve(configDir, `${name}.json`);
  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw readError(configPath, err);
  }
  return parseConfig(content, configPath);
}

/**
 * 列出所有可用的配置文件
 */
export async function listConfigs(configDir: string = getConfigDir()): Promise<string[]> {
  try {
    const files = await readdir(configDir);
    return files
      .filter(f => f.endsWith('.json'))
      .map(f => f.replace('.json', ''))
      .sort();
  } catch {
    return [];
  }
}

/**
 * 按配置创建 Resolver，Provider 使用文件系统
 */
export function createResolverFromConfig(
  name: string = 'default',
  configDir: string = getConfigDir()
): PlaceholderResolver {
  const config = loadConfigSync(name, configDir);
  return new PlaceholderResolver({
    providerDir: config.providerDir,
    provider: new FileProvider(),
    debug: config.debug,
  });
}

/**
 * 解析并校验配置内容
 * 缺省字段使用默认值
 */
export function parseConfig(content: string, configPath?: string): RendererConfigFile {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new TemplateError(`Invalid JSON in config: ${configPath ?? '<inline>'}`, 'INVALID_CONFIG', configPath, { cause: err });
  }

  const data = replaceEnvVars(raw);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new TemplateError(`Config must be a JSON object: ${configPath ?? '<inline>'}`, 'INVALID_CONFIG', configPath);
  }

  const providerDir = 'providerDir' in data ? data.providerDir : DEFAULTS.providerDir;
  if (typeof providerDir !== 'string') {
    throw new TemplateError('Config field "providerDir" must be a string', 'INVALID_CONFIG', configPath);
  }

  const debug = 'debug' in data ? data.debug : DEFAULTS.debug;
  if (typeof debug !== 'boolean') {
    throw new TemplateError('Config field "debug" must be a boolean', 'INVALID_CONFIG', configPath);
  }

  return { providerDir, debug };
}

/**
 * 递归替换对象中的环境变量 ${VAR_NAME}，未设置时替换为空字符串
 */
export function replaceEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] || '';
    });
  }

  if (Array.isArray(obj)) {
    return obj.map(replaceEnvVars);
  }

  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = replaceEnvVars(value);
    }
    return result;
  }

  return obj;
}

function readError(configPath: string, err: unknown): TemplateError {
  const code = err instanceof Error && 'code' in err ? err.code : undefined;
  if (code === 'ENOENT') {
    return new TemplateError(`Config file not found: ${configPath}`, 'FILE_NOT_FOUND', configPath, { cause: err });
  }
  return new TemplateError(`Failed to read config file: ${configPath}`, 'READ_ERROR', configPath, { cause: err });
}
