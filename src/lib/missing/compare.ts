import { countAbsent } from "../table/table";
import type { Table } from "../table/types";
import { resolveTargetColumns } from "./summary";

export type MissingComparisonStatus = "compared" | "missing_after";

export type MissingComparisonRow = {
  column: string;
  status: MissingComparisonStatus;
  missingCountBefore: number;
  missingPctBefore: number;
  missingCountAfter: number | null;
  missingPctAfter: number | null;
  missingCountDelta: number | null;
  missingPctDelta: number | null;
};

const percentOf = (count: number, total: number): number => (total > 0 ? (count / total) * 100 : 0);

/**
 * Absent counts and rates before and after handling. Columns that no longer exist in
 * `after` are kept in the output with status "missing_after".
 */
export const compareMissingBeforeAfter = (
  before: Table,
  after: Table,
  { columns }: { columns?: readonly string[] } = {}
): MissingComparisonRow[] => {
  const names = resolveTargetColumns(before, columns, "compareMissingBeforeAfter");
  const rows = names.flatMap((name): MissingComparisonRow[] => {
    const source = before.columns.get(name);
    if (!source) {
      return [];
    }
    const missingCountBefore = countAbsent(source);
    const missingPctBefore = percentOf(missingCountBefore, before.rowCount);
    const target = after.columns.get(name);
    if (!target) {
      return [
        {
          column: name,
          status: "missing_after",
          missingCountBefore,
          missingPctBefore,
          missingCountAfter: null,
          missingPctAfter: null,
          missingCountDelta: null,
          missingPctDelta: null
        }
      ];
    }
    const missingCountAfter = countAbsent(target);
    const missingPctAfter = percentOf(missingCountAfter, after.rowCount);
    return [
      {
        column: name,
        status: "compared",
        missingCountBefore,
        missingPctBefore,
        missingCountAfter,
        missingPctAfter,
        missingCountDelta: missingCountAfter - missingCountBefore,
        missingPctDelta: missingPctAfter - missingPctBefore
      }
    ];
  });
  return rows.sort((a, b) => b.missingPctBefore - a.missingPctBefore);
};
