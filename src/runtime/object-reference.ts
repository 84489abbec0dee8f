import { logger } from '../logger';
import { ObjectDestroyedError } from './errors';

interface ReferenceState {
  objectName: string;
  handle: bigint | undefined;
  release: (handle: bigint) => void;
}

function releaseState(state: ReferenceState): boolean {
  const { handle } = state;
  if (handle === undefined) {
    return false;
  }
  state.handle = undefined;
  state.release(handle);
  return true;
}

// Eventual cleanup for references nobody destroyed. The held state never
// points back at the reference itself.
const finalizer = new FinalizationRegistry<ReferenceState>(state => {
  try {
    if (releaseState(state)) {
      logger.debug(`Finalized ${state.objectName} that was never destroyed`);
    }
  } catch (error) {
    logger.warn(`Failed to finalize ${state.objectName}: ${error instanceof Error ? error.message : String(error)}`);
  }
});

/**
 * Binding-side owner of one object handle. `destroy()` frees the native
 * object exactly once; any later use of `handle` throws.
 */
export class ObjectReference {
  private readonly state: ReferenceState;

  constructor(readonly objectName: string, handle: bigint, release: (handle: bigint) => void) {
    this.state = { objectName, handle, release };
    finalizer.register(this, this.state, this.state);
  }

  get destroyed(): boolean {
    return this.state.handle === undefined;
  }

  get handle(): bigint {
    const { handle } = this.state;
    if (handle === undefined) {
      throw new ObjectDestroyedError(`${this.objectName} has already been destroyed`);
    }
    return handle;
  }

  destroy(): void {
    finalizer.unregister(this.state);
    releaseState(this.state);
  }
}
