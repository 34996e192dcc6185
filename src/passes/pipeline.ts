/**
 * Rewrite pipeline: builds passes by name and runs them in order.
 *
 * @module
 */

import { assertNever } from '../common/errors';
import { DEFAULT_PIPELINE, type PassName } from '../common/options';
import type { Circuit } from '../ir/circuit';
import { runPasses, type CircuitPass } from '../visitors/outer';
import { ConstantFold } from './constant-fold';
import { DeadCode } from './dead-code';
import { FuseOperators } from './fuse-operators';
import { RemoveDeindex } from './remove-deindex';

export function createPass(name: PassName): CircuitPass {
  switch (name) {
    case 'remove-deindex':
      return new RemoveDeindex();
    case 'constant-fold':
      return new ConstantFold();
    case 'fuse-operators':
      return new FuseOperators();
    case 'dead-code':
      return new DeadCode();
    default:
      return assertNever(name, 'pass');
  }
}

export function optimize(circuit: Circuit, passes: readonly PassName[] = DEFAULT_PIPELINE): Circuit {
  return runPasses(circuit, passes.map(createPass));
}
