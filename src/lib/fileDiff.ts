export type DiffOp = "same" | "add" | "remove";

export type DiffLine = {
  op: DiffOp;
  text: string;
  old_line: number | null;
  new_line: number | null;
};

export type LineDiff = {
  lines: DiffLine[];
  added: number;
  removed: number;
};

/** Line diff over the longest common subsequence of the two texts. */
export function diffLines(before: string, after: string): LineDiff {
  const a = before.split("\n");
  const b = after.split("\n");
  const n = a.length;
  const m = b.length;

  // lcs[i][j] = common length of a[i..] and b[j..]
  const lcs: number[][] = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(0));
  for (let i = n - 1; i >= 0; i -= 1) {
    const row = lcs[i] ?? [];
    const below = lcs[i + 1] ?? [];
    for (let j = m - 1; j >= 0; j -= 1) {
      row[j] = a[i] === b[j] ? (below[j + 1] ?? 0) + 1 : Math.max(below[j] ?? 0, row[j + 1] ?? 0);
    }
  }

  const lines: DiffLine[] = [];
  let added = 0;
  let removed = 0;
  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    const ai = a[i];
    const bj = b[j];
    if (i < n && j < m && ai === bj) {
      lines.push({ op: "same", text: ai ?? "", old_line: i + 1, new_line: j + 1 });
      i += 1;
      j += 1;
    } else if (i < n && (j >= m || (lcs[i + 1]?.[j] ?? 0) >= (lcs[i]?.[j + 1] ?? 0))) {
      lines.push({ op: "remove", text: ai ?? "", old_line: i + 1, new_line: null });
      removed += 1;
      i += 1;
    } else {
      lines.push({ op: "add", text: bj ?? "", old_line: null, new_line: j + 1 });
      added += 1;
      j += 1;
    }
  }
  return { lines, added, removed };
}
