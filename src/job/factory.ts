import * as uuid from 'uuid';
import { EncodableFunctionHandle } from '../functionHandle';
import { Job } from './job';

export interface JobFactoryOptions {
  makeGuid?: () => string;
}

export class JobFactory {
  private readonly makeGuid: () => string;

  constructor(options: JobFactoryOptions = {}) {
    this.makeGuid = options.makeGuid || (() => uuid.v4());
  }

  public make<Handle extends EncodableFunctionHandle>(mapFunctionHandle: Handle, reduceFunctionHandle: Handle): Job<Handle> {
    return new Job(mapFunctionHandle, reduceFunctionHandle, this.makeGuid());
  }
}
