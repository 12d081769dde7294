/**
 * File-backed snapshot persistence for the network.
 *
 * The file holds `{ stateHash, snapshot }`, where stateHash is the
 * SHA-256 of the snapshot's canonical JSON (RFC 8785). A file whose
 * hash does not match is refused rather than partially loaded.
 *
 * Writes go to a temporary file first and are renamed into place, so a
 * crash mid-write leaves the previous snapshot intact.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { NetworkSnapshot } from "@trustnet/trust-lines";

/**
 * SHA-256 of the canonical JSON form of a snapshot.
 */
export function computeStateHash(snapshot: unknown): string {
  return createHash("sha256").update(canonicalize(snapshot)).digest("hex");
}

export interface StoredNetworkSnapshot {
  readonly stateHash: string;
  readonly snapshot: NetworkSnapshot;
}

export class SnapshotFile {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Write a snapshot, replacing any previous one.
   *
   * @returns the stateHash that was written
   */
  save(snapshot: NetworkSnapshot): string {
    const stateHash = computeStateHash(snapshot);
    const stored: StoredNetworkSnapshot = { stateHash, snapshot };

    mkdirSync(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    writeFileSync(tmp, JSON.stringify(stored, null, 2), "utf-8");
    renameSync(tmp, this.path);

    return stateHash;
  }

  /**
   * Read the stored snapshot, or undefined if there is no file.
   *
   * The snapshot is returned as untrusted data: its hash has been
   * checked, its contents have not.
   *
   * @throws {Error} if the file is not valid JSON or fails its hash check
   */
  load(): unknown {
    if (!this.exists()) {
      return undefined;
    }

    const parsed: unknown = JSON.parse(readFileSync(this.path, "utf-8"));
    if (typeof parsed !== "object" || parsed === null) {
      throw new Error(`Snapshot file ${this.path} does not contain an object`);
    }

    const { stateHash, snapshot } = parsed as Record<string, unknown>;
    if (typeof stateHash !== "string" || snapshot === undefined) {
      throw new Error(`Snapshot file ${this.path} is missing stateHash or snapshot`);
    }
    if (computeStateHash(snapshot) !== stateHash) {
      throw new Error(`Snapshot file ${this.path} failed its integrity check`);
    }

    return snapshot;
  }
}
