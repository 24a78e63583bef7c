// lib/outline.ts

export type DayHeading = { day: number; title: string; anchor: string };

const DAY_LINE = /^[\s#>*_]*day\s+(\d{1,3})\b[\s*_]*[:.\-–—]*[\s*_]*(.*)$/i;

/**
 * Finds "Day N" lines in an itinerary's text, first occurrence per day, in text order.
 * Read-only: the text itself is shown untouched.
 */
export function outlineDays(text: string): DayHeading[] {
  const out: DayHeading[] = [];
  const seen = new Set<number>();
  for (const line of (text || "").split(/\r?\n/)) {
    const m = DAY_LINE.exec(line);
    if (!m) continue;
    const day = Number(m[1]);
    if (day < 1 || seen.has(day)) continue;
    seen.add(day);
    const title = m[2].replace(/[\s*_#]+$/, "").trim();
    out.push({ day, title, anchor: `day-${day}` });
  }
  return out;
}

export type TextBlock = { text: string; anchor?: string };

/**
 * Splits the text at the outlined day lines so the view can put an anchor on each.
 * Joining the blocks' text with "\n" gives back the input exactly.
 */
export function splitAtDays(text: string): TextBlock[] {
  const lines = (text || "").split("\n");
  const headings = new Map<number, string>();
  const seen = new Set<number>();
  lines.forEach((line, i) => {
    const m = DAY_LINE.exec(line.replace(/\r$/, ""));
    if (!m) return;
    const day = Number(m[1]);
    if (day < 1 || seen.has(day)) return;
    seen.add(day);
    headings.set(i, `day-${day}`);
  });

  const blocks: TextBlock[] = [];
  let current: TextBlock = { text: "" };
  let started = false;
  lines.forEach((line, i) => {
    const anchor = headings.get(i);
    if (anchor && started) {
      blocks.push(current);
      current = { text: line, anchor };
      return;
    }
    if (anchor) current.anchor = anchor;
    current.text = started ? `${current.text}\n${line}` : line;
    started = true;
  });
  blocks.push(current);
  return blocks;
}
