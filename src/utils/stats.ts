import type {
  AmountStats,
  BribeReport,
  DepartmentAggregate,
  HistogramBin,
  Summary,
} from "../types";

const isPresent = (amount: number | null): amount is number =>
  amount !== null && Number.isFinite(amount);

function presentAmounts(rows: BribeReport[]): number[] {
  const values: number[] = [];
  for (const row of rows) {
    if (isPresent(row.amount)) values.push(row.amount);
  }
  return values;
}

const mean = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

// Halves round up, judged on value * 10 after its own float rounding, not on the decimal text
const roundTo1 = (value: number) => Math.round(value * 10) / 10;

// Linear interpolation between closest ranks; expects sorted input
export function quantile(sorted: number[], p: number): number | null {
  if (!sorted.length) return null;
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const weight = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * weight;
}

export function describeAmounts(rows: BribeReport[]): AmountStats {
  const sorted = presentAmounts(rows).sort((a, b) => a - b);
  const count = sorted.length;
  if (!count) {
    return { count, mean: null, std: null, min: null, q1: null, median: null, q3: null, max: null };
  }

  const avg = mean(sorted);
  const std =
    count > 1
      ? Math.sqrt(sorted.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (count - 1))
      : null;

  return {
    count,
    mean: avg,
    std,
    min: sorted[0],
    q1: quantile(sorted, 0.25),
    median: quantile(sorted, 0.5),
    q3: quantile(sorted, 0.75),
    max: sorted[count - 1],
  };
}

// Groups keep first-appearance order, so the stable sort breaks ties by it.
// Departments with no usable amount keep a null mean and sort last.
export function aggregateByDepartment(rows: BribeReport[]): DepartmentAggregate[] {
  const groups = new Map<string, number[]>();
  for (const row of rows) {
    let amounts = groups.get(row.department);
    if (!amounts) {
      amounts = [];
      groups.set(row.department, amounts);
    }
    if (isPresent(row.amount)) amounts.push(row.amount);
  }

  const aggregates: DepartmentAggregate[] = [];
  for (const [department, amounts] of groups) {
    aggregates.push({
      department,
      meanAmount: amounts.length ? roundTo1(mean(amounts)) : null,
      count: amounts.length,
    });
  }

  return aggregates.sort((a, b) => {
    if (a.meanAmount === null || b.meanAmount === null) {
      return (a.meanAmount === null ? 1 : 0) - (b.meanAmount === null ? 1 : 0);
    }
    return b.meanAmount - a.meanAmount;
  });
}

export function logHistogram(values: number[], binsPerDecade = 1): HistogramBin[] {
  const positive = values.filter((v) => Number.isFinite(v) && v > 0).sort((a, b) => a - b);
  if (!positive.length) return [];

  const min = positive[0];
  const max = positive[positive.length - 1];
  const edge = (k: number) => 10 ** (k / binsPerDecade);

  let k = Math.floor(Math.log10(min) * binsPerDecade);
  while (edge(k) > min) k--;

  const bins: HistogramBin[] = [];
  while (edge(k) <= max) {
    bins.push({ lower: edge(k), upper: edge(k + 1), count: 0 });
    k++;
  }

  for (const value of positive) {
    const bin = bins.find((b) => value >= b.lower && value < b.upper);
    if (bin) bin.count++;
  }
  return bins;
}

export function summarize(rows: BribeReport[], options: { binsPerDecade?: number } = {}): Summary {
  return {
    overall: describeAmounts(rows),
    byDepartment: aggregateByDepartment(rows),
    histogram: logHistogram(presentAmounts(rows), options.binsPerDecade),
  };
}
