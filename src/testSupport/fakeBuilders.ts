import { each, MockFactory } from '@test';
import { FunctionHandle, FunctionHandleDict } from 'src/functionHandle';
import casual = require('casual');

export const functionHandleDictFactory = MockFactory.makeFactory<FunctionHandleDict>({
  function_name: each((seq) => `${casual.word}${seq}`),
  modules_to_load: [{ filename: 'analysis/metrics.js' }],
  options: { threshold: 1 },
});

export function makeFunctionHandle(functionName?: string): FunctionHandle {
  const overrides = functionName === undefined ? {} : { function_name: functionName };
  return FunctionHandle.fromDict(functionHandleDictFactory.build(overrides));
}
