import type { Artifact } from '../execution/types.js';
import type { TurnArtifact } from './types.js';

export type AccumulatedArtifact = TurnArtifact;

/**
 * Append-only artifact log for one orchestration run. Artifacts keep arrival order, steps are
 * concatenated, and the same artifact object is never recorded twice. Separate artifacts with equal
 * content are all kept.
 */
export class ArtifactAccumulator {
  private readonly entries: AccumulatedArtifact[] = [];
  private readonly seen = new Set<Artifact>();

  append(stepOrder: number, artifacts: readonly Artifact[]): number {
    let added = 0;
    for (const artifact of artifacts) {
      if (this.seen.has(artifact)) {
        continue;
      }
      this.seen.add(artifact);
      this.entries.push({ kind: artifact.kind, payload: artifact.payload, stepOrder, sequence: this.entries.length + 1 });
      added += 1;
    }
    return added;
  }

  forStep(stepOrder: number): Artifact[] {
    return this.entries
      .filter((entry) => entry.stepOrder === stepOrder)
      .map(({ kind, payload }) => ({ kind, payload }));
  }

  all(): AccumulatedArtifact[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.length;
  }
}
