import { cellKey, compareCells } from "../table/table";
import type { CellValue } from "../table/types";

/**
 * Most frequent present value; ties go to the smallest value.
 */
export const modeOf = (cells: readonly CellValue[]): CellValue => {
  const counts = new Map<string, { value: CellValue; count: number }>();
  cells.forEach((value) => {
    if (value === null) {
      return;
    }
    const key = cellKey(value);
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { value, count: 1 });
    }
  });

  let best: { value: CellValue; count: number } | null = null;
  for (const entry of counts.values()) {
    if (
      best === null ||
      entry.count > best.count ||
      (entry.count === best.count && compareCells(entry.value, best.value) < 0)
    ) {
      best = entry;
    }
  }
  return best === null ? null : best.value;
};

export const fillAbsent = (cells: readonly CellValue[], value: CellValue): CellValue[] =>
  cells.map((cell) => (cell === null ? value : cell));

export const forwardFill = (cells: readonly CellValue[]): CellValue[] => {
  let last: CellValue = null;
  return cells.map((cell) => {
    if (cell !== null) {
      last = cell;
      return cell;
    }
    return last;
  });
};

export const backwardFill = (cells: readonly CellValue[]): CellValue[] =>
  forwardFill([...cells].reverse()).reverse();

/**
 * Linear interpolation over equally spaced positions. Leading and trailing gaps take
 * the nearest present value.
 */
export const interpolateLinear = (values: readonly (number | null)[]): (number | null)[] => {
  const present: number[] = [];
  values.forEach((value, index) => {
    if (value !== null) {
      present.push(index);
    }
  });
  if (present.length === 0) {
    return [...values];
  }

  let cursor = 0;
  return values.map((value, index) => {
    if (value !== null) {
      return value;
    }
    while (cursor < present.length && present[cursor] < index) {
      cursor += 1;
    }
    const nextIndex = present[cursor];
    const prevIndex = present[cursor - 1];
    const next = nextIndex === undefined ? null : values[nextIndex] ?? null;
    const prev = prevIndex === undefined ? null : values[prevIndex] ?? null;
    if (prev === null || prevIndex === undefined) {
      return next;
    }
    if (next === null || nextIndex === undefined) {
      return prev;
    }
    return prev + ((next - prev) * (index - prevIndex)) / (nextIndex - prevIndex);
  });
};

/**
 * Runs `fill` over the cells visited in `order` and writes the results back to their
 * original positions.
 */
export const fillAlongOrder = <T>(
  cells: readonly T[],
  order: readonly number[],
  fill: (sequence: T[]) => T[]
): T[] => {
  const sequence = order.map((index) => cells[index]);
  const filled = fill(sequence);
  const result = [...cells];
  order.forEach((index, position) => {
    result[index] = filled[position];
  });
  return result;
};
