export type Unit = {
  readonly topic: string;
  readonly subtopic: string;
  readonly sectionRef: string;
  readonly sectionHeading: string;
  readonly subsectionRef: string;
  readonly text: string;
};

export type ChangeStatus = "Added" | "Removed" | "Unchanged" | "Minor edit" | "Modified" | "Substantially modified";

export type MatchMethod = "exact_key" | "fuzzy_heading" | "unmatched_old" | "new_only";

export type MatchRecord = {
  readonly oldUnit: Unit | null;
  readonly newUnit: Unit | null;
  readonly status: ChangeStatus;
  readonly similarity: number;
  readonly matchMethod: MatchMethod;
};

export type ComparisonSummary = {
  total: number;
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
};

export type ExportFormat = "xlsx" | "csv" | "docx";

export type ExportJobStatus = "none" | "pending" | "running" | "done" | "failed";

export type ExportJobState = {
  status: ExportJobStatus;
  jobId: string | null;
  error: string | null;
};

export type DocumentMeta = {
  fileName: string;
  mimeType: string;
  sha256: string;
  units: number;
};

export type ComparisonJsonV1 = {
  schemaVersion: "1";
  compareId: string;
  createdAt: string;
  document: {
    old: DocumentMeta;
    new: DocumentMeta;
  };
  summary: ComparisonSummary;
  records: MatchRecord[];
  exports: Record<ExportFormat, ExportJobState>;
  artifacts: {
    reportUrl: string;
  };
};
