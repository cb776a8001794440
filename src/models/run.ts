/**
 * Run/lumi provenance for a tracked file
 *
 * A Run is a run number plus the set of luminosity sections (sub-runs)
 * the file covers. Runs only ever grow: adding a run that is already
 * present unions its lumi sections.
 */

export class Run {
  readonly run: number;
  private readonly lumiSet: Set<number>;

  constructor(run: number, ...lumis: number[]) {
    this.run = run;
    this.lumiSet = new Set(lumis);
  }

  /** Lumi sections in ascending order */
  get lumis(): number[] {
    return [...this.lumiSet].sort((a, b) => a - b);
  }

  hasLumi(lumi: number): boolean {
    return this.lumiSet.has(lumi);
  }

  /**
   * Union another entry for the same run into this one
   * @throws Error if the run numbers differ
   */
  merge(other: Run): this {
    if (other.run !== this.run) {
      throw new Error(`Cannot merge run ${String(other.run)} into run ${String(this.run)}`);
    }
    for (const lumi of other.lumiSet) {
      this.lumiSet.add(lumi);
    }
    return this;
  }

  clone(): Run {
    return new Run(this.run, ...this.lumiSet);
  }

  equals(other: Run): boolean {
    if (other.run !== this.run || other.lumiSet.size !== this.lumiSet.size) {
      return false;
    }
    for (const lumi of this.lumiSet) {
      if (!other.lumiSet.has(lumi)) return false;
    }
    return true;
  }
}

/**
 * Merge runs into a run-number keyed map, unioning lumis of repeated runs.
 * Stored entries are clones; callers keep ownership of what they pass in.
 */
export function mergeRuns(target: Map<number, Run>, runs: Iterable<Run>): void {
  for (const run of runs) {
    const existing = target.get(run.run);
    if (existing) {
      existing.merge(run);
    } else {
      target.set(run.run, run.clone());
    }
  }
}
