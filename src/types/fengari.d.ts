/**
 * fengari / fengari-interop 类型声明
 * 两个包均未自带类型，这里只声明用到的 API
 */

declare module 'fengari' {
  namespace fengari {
    /** Lua 状态机（不透明句柄） */
    interface lua_State {
      readonly __luaState: never;
    }

    type lua_CFunction = (L: lua_State) => number;

    namespace lua {
      const LUA_OK: number;
      const LUA_REGISTRYINDEX: number;

      function lua_close(L: lua_State): void;
      function lua_pcall(L: lua_State, nargs: number, nresults: number, msgh: number): number;
      function lua_pop(L: lua_State, n: number): void;
      function lua_settop(L: lua_State, idx: number): void;
      function lua_rawgeti(L: lua_State, idx: number, n: number): number;
      function lua_toboolean(L: lua_State, idx: number): boolean;
      function lua_tojsstring(L: lua_State, idx: number): string;
    }

    namespace lauxlib {
      function luaL_newstate(): lua_State;
      function luaL_loadbuffer(L: lua_State, buff: Uint8Array, size: number, name: Uint8Array): number;
      function luaL_ref(L: lua_State, t: number): number;
      function luaL_requiref(L: lua_State, modname: Uint8Array, openf: lua_CFunction, glb: number): void;
    }

    namespace lualib {
      const luaopen_base: lua_CFunction;
      const luaopen_coroutine: lua_CFunction;
      const luaopen_math: lua_CFunction;
      const luaopen_string: lua_CFunction;
      const luaopen_table: lua_CFunction;
      const luaopen_utf8: lua_CFunction;
    }

    function to_luastring(str: string): Uint8Array;
  }

  export = fengari;
}

declare module 'fengari-interop' {
  import type { lua_State, lua_CFunction } from 'fengari';

  namespace interop {
    /** 注册 JS 代理元表；requiref 的 glb 传 0 时不会暴露全局 js */
    const luaopen_js: lua_CFunction;
    /** 将 JS 值压栈：原始值转为 Lua 值，对象/函数作为代理 userdata */
    function push(L: lua_State, value: unknown): void;
  }

  export = interop;
}
