import type { AnnotationStore, NumberAnnotation, SequenceValidation } from "@numbermark/core";

export type OutputFormat = "text" | "json";

export type AnnotationRow = {
  id: string;
  label: string;
  /** Zero-based page index */
  page: number;
  x: number;
  y: number;
  /** Whether a mark was found for the annotation; absent for JSON sources */
  linked?: boolean;
};

export type DocumentReport = {
  source: string;
  pages?: number;
  annotations: AnnotationRow[];
  nextLabel: string;
  validation: SequenceValidation;
  /** One entry per shared token, e.g. "3 (x2)" */
  duplicates: string[];
};

export interface ReportExtras {
  pages?: number;
  isLinked?: (annotation: NumberAnnotation) => boolean;
}

export function buildReport(
  source: string,
  store: AnnotationStore,
  extras: ReportExtras = {}
): DocumentReport {
  return {
    source,
    pages: extras.pages,
    annotations: store.allSorted().map((annotation) => ({
      id: annotation.id,
      label: annotation.label,
      page: annotation.page,
      x: annotation.x,
      y: annotation.y,
      linked: extras.isLinked?.(annotation),
    })),
    nextLabel: store.nextWholeNumber(),
    validation: store.validateSequence(),
    duplicates: store
      .findDuplicates()
      .map((group) => `${group[0]?.label ?? "?"} (x${group.length})`),
  };
}

export function reportHasProblems(report: DocumentReport): boolean {
  return !report.validation.valid || report.duplicates.length > 0;
}

export function formatReport(report: DocumentReport, output: OutputFormat): string {
  if (output === "json") {
    return JSON.stringify(report, null, 2);
  }

  const lines = [`Document: ${report.source}`];
  if (report.pages !== undefined) {
    lines.push(`Pages: ${report.pages}`);
  }
  lines.push(`Annotations: ${report.annotations.length}`);
  lines.push(`Next number: ${report.nextLabel}`);
  lines.push(`Sequence: ${report.validation.message}`);
  lines.push(`Duplicates: ${report.duplicates.length > 0 ? report.duplicates.join(", ") : "none"}`);

  for (const row of report.annotations) {
    const unlinked = row.linked === false ? "  [no mark]" : "";
    const position = `(${round(row.x)}, ${round(row.y)})`;
    lines.push(`  #${row.label.padEnd(6)} page ${row.page + 1}  ${position}${unlinked}`);
  }
  return lines.join("\n");
}

function round(value: number): number {
  return Math.round(value * 10) / 10;
}
