import * as uuid from 'uuid';
import { EncodableFunctionHandle, FunctionHandle, FunctionHandleDecoder } from '../functionHandle';
import { logger } from '../logger';
import { decodeWith } from '../utils/decode';
import { JobDict, jobDictSchema } from './schema';

/**
 * A unit of map-reduce work: which function maps, which one reduces, and the id it goes by.
 * Instances are frozen once built.
 */
export class Job<Handle extends EncodableFunctionHandle = FunctionHandle> {
  public static fromDict(jobDict: unknown): Job<FunctionHandle>;
  public static fromDict<Handle extends EncodableFunctionHandle>(
    jobDict: unknown,
    decodeHandle: FunctionHandleDecoder<Handle>,
  ): Job<Handle>;
  public static fromDict(
    jobDict: unknown,
    decodeHandle: FunctionHandleDecoder<EncodableFunctionHandle> = FunctionHandle.fromDict,
  ): Job<EncodableFunctionHandle> {
    const decoded = decodeWith(jobDictSchema, jobDict, 'job');
    const mapFunctionHandle = decodeHandle(decoded.map_function_handle);
    const reduceFunctionHandle = decodeHandle(decoded.reduce_function_handle);
    const job = new Job(mapFunctionHandle, reduceFunctionHandle, decoded.guid);
    if (decoded.guid === undefined) {
      logger.debug(`Job mapping carried no guid, assigned ${job.guid}`);
    }
    return job;
  }

  public readonly guid: string;

  constructor(
    public readonly mapFunctionHandle: Handle,
    public readonly reduceFunctionHandle: Handle,
    guid?: string,
  ) {
    this.guid = guid ?? uuid.v4();
    Object.freeze(this);
  }

  public asDict(): JobDict {
    return {
      map_function_handle: this.mapFunctionHandle.asDict(),
      reduce_function_handle: this.reduceFunctionHandle.asDict(),
      guid: String(this.guid),
    };
  }
}
