import {
  compareSeverity,
  maxSeverity,
  type Severity,
  type ThresholdMode
} from "./severity.js";

export interface Problem {
  readonly severity: Exclude<Severity, "NONE">;
  readonly message: string;
  /** Where in the document the problem was found, e.g. "default.canary.google". */
  readonly location: string;
  readonly remediation?: string;
}

/**
 * Ordered, immutable collection of validation findings.
 */
export class ProblemReport {
  static readonly EMPTY = new ProblemReport([]);

  readonly problems: readonly Problem[];

  constructor(problems: readonly Problem[]) {
    this.problems = Object.freeze(problems.map((problem) => Object.freeze({ ...problem })));
  }

  get size(): number {
    return this.problems.length;
  }

  get isEmpty(): boolean {
    return this.problems.length === 0;
  }

  worstSeverity(): Severity {
    let worst: Severity = "NONE";
    for (const problem of this.problems) {
      worst = maxSeverity(worst, problem.severity);
    }
    return worst;
  }

  exceeds(threshold: Severity, mode: ThresholdMode = "exceeds"): boolean {
    const worst = this.worstSeverity();
    if (mode === "atOrAbove") {
      return worst !== "NONE" && compareSeverity(worst, threshold) >= 0;
    }
    return compareSeverity(worst, threshold) > 0;
  }

  /** Problems at or above `severity`, in their original order. */
  atOrAbove(severity: Severity): ProblemReport {
    return new ProblemReport(
      this.problems.filter((problem) => compareSeverity(problem.severity, severity) >= 0)
    );
  }

  concat(other: ProblemReport): ProblemReport {
    if (other.isEmpty) return this;
    if (this.isEmpty) return other;
    return new ProblemReport([...this.problems, ...other.problems]);
  }

  toJSON(): { worstSeverity: Severity; problems: Problem[] } {
    return {
      worstSeverity: this.worstSeverity(),
      problems: this.problems.map((problem) => ({ ...problem }))
    };
  }
}

export class ProblemReportBuilder {
  private readonly problems: Problem[] = [];
  private readonly baseLocation: string;

  constructor(baseLocation = "") {
    this.baseLocation = baseLocation;
  }

  add(
    severity: Problem["severity"],
    message: string,
    options: { location?: string; remediation?: string } = {}
  ): this {
    const location = joinLocation(this.baseLocation, options.location);
    const problem: Problem =
      options.remediation === undefined
        ? { severity, message, location }
        : { severity, message, location, remediation: options.remediation };
    this.problems.push(problem);
    return this;
  }

  build(): ProblemReport {
    return this.problems.length === 0 ? ProblemReport.EMPTY : new ProblemReport(this.problems);
  }
}

function joinLocation(base: string, location: string | undefined): string {
  if (!location) return base;
  if (!base) return location;
  return `${base}.${location}`;
}
