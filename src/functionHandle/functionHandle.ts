import { DecodeError } from '../errors';
import { decodeWith } from '../utils/decode';
import { ModuleToLoad } from './moduleToLoad';
import { FunctionHandleDict, functionHandleDictSchema, FunctionHandleOptions } from './schema';

/**
 * Anything a Job can carry as its map or reduce function: it only has to know how to encode itself.
 */
export interface EncodableFunctionHandle {
  asDict(): { [key: string]: unknown };
}

export type FunctionHandleDecoder<Handle extends EncodableFunctionHandle> = (handleDict: unknown) => Handle;

/**
 * @param modulesToLoad modules the function is defined in, loaded in order
 * @param functionName name of the function once the modules are loaded
 * @param options passed through to the function when it runs
 */
export interface FunctionHandleInit {
  modulesToLoad?: ModuleToLoad[];
  functionName: string;
  options?: FunctionHandleOptions;
}

export class FunctionHandle implements EncodableFunctionHandle {
  public static fromDict(handleDict: unknown): FunctionHandle {
    const decoded = decodeWith(functionHandleDictSchema, handleDict, 'function handle');
    return new FunctionHandle({
      modulesToLoad: (decoded.modules_to_load ?? []).map((module) => new ModuleToLoad(module)),
      functionName: decoded.function_name,
      options: decoded.options,
    });
  }

  /**
   * Inverse of {@link asUserFriendlyString} for handles made of filenames, e.g. `mapper.py:Map`.
   */
  public static fromUserFriendlyString(text: string): FunctionHandle {
    const parts = text.split(':');
    const functionName = parts.pop();
    if (!functionName) {
      throw new DecodeError('function handle string', [`'${text}' does not end with a function name`]);
    }
    if (parts.some((filename) => filename === '')) {
      throw new DecodeError('function handle string', [`'${text}' has an empty module filename`]);
    }
    return new FunctionHandle({
      modulesToLoad: parts.map((filename) => new ModuleToLoad({ filename })),
      functionName,
    });
  }

  public readonly modulesToLoad: ReadonlyArray<ModuleToLoad>;
  public readonly functionName: string;
  public readonly options: Readonly<FunctionHandleOptions> | null;

  constructor(init: FunctionHandleInit) {
    this.modulesToLoad = Object.freeze([...(init.modulesToLoad ?? [])]);
    this.functionName = init.functionName;
    this.options = init.options ? Object.freeze({ ...init.options }) : null;
    Object.freeze(this);
  }

  get hasHrefs(): boolean {
    return this.modulesToLoad.some((module) => module.href !== null);
  }

  /**
   * Replace every href module with the filename `resolve` maps it to.
   */
  public withResolvedHrefs(resolve: (href: string) => string): FunctionHandle {
    return new FunctionHandle({
      modulesToLoad: this.modulesToLoad.map((module) =>
        module.href === null ? module : new ModuleToLoad({ filename: resolve(module.href) })),
      functionName: this.functionName,
      options: this.options ?? undefined,
    });
  }

  public asDict(): FunctionHandleDict {
    const handleDict: FunctionHandleDict = {
      function_name: this.functionName,
      modules_to_load: this.modulesToLoad.map((module) => module.asDict()),
    };
    if (this.options !== null) {
      handleDict.options = { ...this.options };
    }
    return handleDict;
  }

  public asUserFriendlyString(): string {
    return [...this.modulesToLoad.map((module) => module.toString()), this.functionName].join(':');
  }
}
