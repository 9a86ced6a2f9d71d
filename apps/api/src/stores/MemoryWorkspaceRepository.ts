import type { WorkspaceRepository, WorkspaceSnapshot } from './WorkspaceRepository';
import { emptySnapshot, fromSnapshot, toSnapshot } from './WorkspaceRepository';

/**
 * In-process repository for tests and dry runs. `failSaves` makes every save
 * reject, which is how storage failures are simulated.
 */
export class MemoryWorkspaceRepository implements WorkspaceRepository {
  saveCount = 0;
  failSaves: Error | null = null;
  private snapshot: WorkspaceSnapshot;

  constructor(initial: Partial<WorkspaceSnapshot> = {}) {
    this.snapshot = { ...emptySnapshot(), ...initial };
  }

  async load(): Promise<WorkspaceSnapshot> {
    return toSnapshot(fromSnapshot(this.snapshot));
  }

  async save(snapshot: WorkspaceSnapshot): Promise<void> {
    if (this.failSaves) {
      throw this.failSaves;
    }
    this.snapshot = toSnapshot(fromSnapshot(snapshot));
    this.saveCount += 1;
  }

  get stored(): WorkspaceSnapshot {
    return toSnapshot(fromSnapshot(this.snapshot));
  }
}
