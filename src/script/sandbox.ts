/**
 * Lua 脚本沙箱
 * 基于 fengari（纯 JS 实现的 Lua 5.3），同步解析和执行
 */

import fengari from 'fengari';
import interop from 'fengari-interop';
import type { lua_State, lua_CFunction } from 'fengari';
import { TemplateError } from '../template/types.js';

const { lua, lauxlib, lualib, to_luastring } = fengari;

/**
 * 已解析的脚本片段（函数保存在注册表中）
 */
export interface ScriptFragment {
  readonly ref: number;
  readonly chunkName: string;
}

/**
 * 脚本返回值：type 为 Lua 类型名，text 为 tostring 结果
 */
export interface ScriptValue {
  type: string;
  text: string;
}

export type ParseResult =
  | { ok: true; fragment: ScriptFragment }
  | { ok: false; error: string };

export type ExecuteResult =
  | { ok: true; value: ScriptValue }
  | { ok: false; error: string };

/**
 * 脚本沙箱接口
 */
export interface ScriptSandbox {
  parse(code: string, chunkName?: string): ParseResult;
  execute(fragment: ScriptFragment, argument?: unknown): ExecuteResult;
  close(): void;
}

/** 打开的标准库；os / io / debug / package 不开放 */
const OPEN_LIBS: Array<[string, lua_CFunction]> = [
  ['_G', lualib.luaopen_base],
  ['coroutine', lualib.luaopen_coroutine],
  ['math', lualib.luaopen_math],
  ['string', lualib.luaopen_string],
  ['table', lualib.luaopen_table],
  ['utf8', lualib.luaopen_utf8],
];

/**
 * 值描述函数，返回 ok, type(v), tostring(v)
 * tostring 失败（__tostring 出错或返回非字符串）时 ok 为 false，text 为错误信息
 */
const DESCRIBE_SOURCE = `
local pcall, tostring, type = pcall, tostring, type
return function(v)
  local ok, text = pcall(tostring, v)
  if ok then return true, type(v), text end
  if type(text) ~= 'string' then
    text = '(error object is a ' .. type(text) .. ' value)'
  end
  return false, type(v), text
end
`;

interface Description {
  ok: boolean;
  type: string;
  text: string;
}

/**
 * Lua 沙箱
 * 一个实例对应一个独立的 Lua 状态，全局变量在同一实例内共享
 */
export class LuaSandbox implements ScriptSandbox {
  private L: lua_State | null;
  private describeRef: number;

  constructor() {
    const L = lauxlib.luaL_newstate();
    for (const [name, open] of OPEN_LIBS) {
      lauxlib.luaL_requiref(L, to_luastring(name), open, 1);
      lua.lua_pop(L, 1);
    }
    // 注册 JS 代理元表，但不暴露全局 js
    lauxlib.luaL_requiref(L, to_luastring('js'), interop.luaopen_js, 0);
    lua.lua_pop(L, 1);

    const describe = to_luastring(DESCRIBE_SOURCE);
    if (
      lauxlib.luaL_loadbuffer(L, describe, describe.length, to_luastring('=describe')) !== lua.LUA_OK ||
      lua.lua_pcall(L, 0, 1, 0) !== lua.LUA_OK
    ) {
      const message = lua.lua_tojsstring(L, -1);
      lua.lua_close(L);
      throw new Error(`Failed to initialize Lua sandbox: ${message}`);
    }
    this.describeRef = lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX);
    this.L = L;
  }

  /**
   * 解析脚本
   * chunkName 决定错误信息中的来源前缀，默认使用代码本身
   * 成功时函数存入注册表，返回片段句柄
   */
  parse(code: string, chunkName: string = code): ParseResult {
    const L = this.state();
    lua.lua_settop(L, 0);
    this.pushDescribe(L);
    const buff = to_luastring(code);
    const status = lauxlib.luaL_loadbuffer(L, buff, buff.length, to_luastring(chunkName));
    if (status !== lua.LUA_OK) {
      return { ok: false, error: this.describeTop(L).text };
    }
    const ref = lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX);
    lua.lua_settop(L, 0);
    return { ok: true, fragment: { ref, chunkName } };
  }

  /**
   * 执行片段
   * argument 不为 undefined 时作为唯一参数传入（脚本内用 ... 取得）
   */
  execute(fragment: ScriptFragment, argument?: unknown): ExecuteResult {
    const L = this.state();
    lua.lua_settop(L, 0);
    this.pushDescribe(L);
    lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, fragment.ref);

    let nargs = 0;
    if (argument !== undefined) {
      interop.push(L, argument);
      nargs = 1;
    }

    const status = lua.lua_pcall(L, nargs, 1, 0);
    const described = this.describeTop(L);
    if (status !== lua.LUA_OK || !described.ok) {
      return { ok: false, error: described.text };
    }
    return { ok: true, value: { type: described.type, text: described.text } };
  }

  /**
   * 关闭 Lua 状态，重复调用无副作用
   */
  close(): void {
    if (this.L) {
      lua.lua_close(this.L);
      this.L = null;
    }
  }

  get closed(): boolean {
    return this.L === null;
  }

  private state(): lua_State {
    if (!this.L) {
      throw new TemplateError('Lua sandbox is closed', 'SANDBOX_CLOSED');
    }
    return this.L;
  }

  private pushDescribe(L: lua_State): void {
    lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, this.describeRef);
  }

  /**
   * 在保护模式下对栈顶值调用描述函数，随后清栈
   * 调用前栈为 [describe, value]
   */
  private describeTop(L: lua_State): Description {
    const status = lua.lua_pcall(L, 1, 3, 0);
    let result: Description;
    if (status === lua.LUA_OK) {
      result = {
        ok: lua.lua_toboolean(L, -3),
        type: lua.lua_tojsstring(L, -2),
        text: lua.lua_tojsstring(L, -1),
      };
    } else {
      result = { ok: false, type: 'nil', text: '(error while converting script value)' };
    }
    lua.lua_settop(L, 0);
    return result;
  }
}

/**
 * 快捷函数：在一次性沙箱中运行脚本
 * @example runScript('return 1+1') => { ok: true, value: { type: 'number', text: '2' } }
 */
export function runScript(code: string, argument?: unknown): ExecuteResult {
  const sandbox = new LuaSandbox();
  try {
    const parsed = sandbox.parse(code);
    if (!parsed.ok) {
      return parsed;
    }
    return sandbox.execute(parsed.fragment, argument);
  } finally {
    sandbox.close();
  }
}
