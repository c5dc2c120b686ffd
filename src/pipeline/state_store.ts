import { access, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { resolveLayoutPath } from "./layout.ts";

export const MARKER_FILE_NAME = ".done";

/**
 * Completion state of stages and steps. A step is complete only once
 * `markComplete` has been called after all of its work succeeded.
 */
export interface StateStore {
  isComplete(stepId: string): Promise<boolean>;
  markComplete(stepId: string): Promise<void>;
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Marker files inside each step's output directory. Presence, not content,
 * signals success.
 */
export class FileMarkerStore implements StateStore {
  readonly workRoot: string;

  constructor(workRoot: string) {
    this.workRoot = workRoot;
  }

  markerPath(stepId: string): string {
    return path.join(resolveLayoutPath(this.workRoot, stepId), MARKER_FILE_NAME);
  }

  async isComplete(stepId: string): Promise<boolean> {
    return pathExists(this.markerPath(stepId));
  }

  async markComplete(stepId: string): Promise<void> {
    const markerPath = this.markerPath(stepId);
    await mkdir(path.dirname(markerPath), { recursive: true });
    await writeFile(markerPath, "", "utf-8");
  }
}

export class MemoryStateStore implements StateStore {
  readonly completed = new Set<string>();

  constructor(completed: Iterable<string> = []) {
    for (const stepId of completed) {
      this.completed.add(stepId);
    }
  }

  async isComplete(stepId: string): Promise<boolean> {
    return this.completed.has(stepId);
  }

  async markComplete(stepId: string): Promise<void> {
    this.completed.add(stepId);
  }
}
