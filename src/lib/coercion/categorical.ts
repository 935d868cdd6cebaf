import { categoricalColumn, cellsOf } from "../table/table";
import type { CategoricalColumn, Column } from "../table/types";
import { toToken } from "./tokens";

export type CategoricalOptions = {
  lowercase?: boolean;
  strip?: boolean;
  minFreq?: number;
  otherLabel?: string;
};

export type CategoricalCoercion = {
  column: CategoricalColumn;
  collapsed: string[];
};

const normalizeLabel = (token: string, lowercase: boolean, strip: boolean): string | null => {
  let label = strip ? token.trim() : token;
  if (lowercase) {
    label = label.toLowerCase();
  }
  return label.trim().length === 0 ? null : label;
};

/**
 * Normalizes free-text labels and folds every label seen fewer than `minFreq`
 * times into `otherLabel`.
 */
export const coerceCategoricalColumn = (
  column: Column,
  { lowercase = true, strip = true, minFreq = 1, otherLabel = "Other" }: CategoricalOptions = {}
): CategoricalCoercion => {
  const labels = cellsOf(column).map((value) => {
    const token = toToken(value);
    return token === null ? null : normalizeLabel(token, lowercase, strip);
  });

  const counts = new Map<string, number>();
  labels.forEach((label) => {
    if (label !== null) {
      counts.set(label, (counts.get(label) ?? 0) + 1);
    }
  });

  const rare = new Set(
    Array.from(counts.entries())
      .filter(([, count]) => count < minFreq)
      .map(([label]) => label)
  );

  return {
    column: categoricalColumn(
      labels.map((label) => (label !== null && rare.has(label) ? otherLabel : label))
    ),
    collapsed: Array.from(rare).sort()
  };
};
