export type BribeReport = {
  amount: number | null;
  transaction: string;
  department: string;
};

export type ExtractedFields = {
  amounts: string[];
  transactions: string[];
  departments: string[];
};

export type ReportSelectors = {
  amount: string;
  transaction: string;
  department: string;
};

// "truncate" drops trailing elements of the longer sequences
export type ShapeMismatchPolicy = "truncate" | "error";

export type PageFailurePolicy = "abort" | "continue";

export type PageOutcome =
  | { ok: true; url: string; offset: number; rows: BribeReport[] }
  | { ok: false; url: string; offset: number; error: Error };

export type AmountStats = {
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  q1: number | null;
  median: number | null;
  q3: number | null;
  max: number | null;
};

export type DepartmentAggregate = {
  department: string;
  meanAmount: number | null;
  count: number;
};

export type HistogramBin = {
  lower: number;
  upper: number;
  count: number;
};

export type Summary = {
  overall: AmountStats;
  byDepartment: DepartmentAggregate[];
  histogram: HistogramBin[];
};

export type ScrapeReport = {
  rows: BribeReport[];
  summary: Summary;
  pagesScraped: number;
  failures: { url: string; message: string }[];
};
