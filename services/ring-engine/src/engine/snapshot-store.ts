// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@concentric/ring-engine-service/engine/snapshot-store`
 * Purpose: Snapshot sink port and the in-process sink that keeps the newest snapshot.
 * Scope: Hand-off between the tick loop and readers (HTTP). Does not copy snapshots.
 * Invariants: Never moves backwards in sequence.
 * Side-effects: none
 * Links: src/engine/tick-loop.ts, src/health.ts
 * @public
 */

import type { Snapshot } from "./temporal-model-engine.js";

export interface SnapshotSink {
  publish(snapshot: Snapshot): void;
}

export class LatestSnapshotStore implements SnapshotSink {
  private latest: Snapshot | undefined;

  publish(snapshot: Snapshot): void {
    if (this.latest === undefined || snapshot.sequence > this.latest.sequence) {
      this.latest = snapshot;
    }
  }

  get(): Snapshot | undefined {
    return this.latest;
  }
}
