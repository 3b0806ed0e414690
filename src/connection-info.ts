import type { FunctionInfoMap } from './types';

/** Where a running UDF app can be reached and what it serves. */
export class UdfConnectionInfo {
  readonly url: string;
  readonly functions: FunctionInfoMap;

  constructor(url: string, functions: FunctionInfoMap) {
    this.url = url;
    this.functions = functions;
  }

  toJSON() {
    return { url: this.url, functions: this.functions };
  }
}
