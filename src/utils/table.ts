import type { BribeReport } from "../types";

export function assemble(pageTables: BribeReport[][]): BribeReport[] {
  return pageTables.flat();
}
