const COUNTER_PATTERN = /%(0?)(\d*)d/g;

export function hasCounter(template: string): boolean {
  return new RegExp(COUNTER_PATTERN.source).test(template);
}

/** Fills `%d` / `%0Nd` placeholders with the segment counter. */
export function formatSegmentPath(template: string, index: number): string {
  return template.replace(COUNTER_PATTERN, (_match, zero: string, width: string) => {
    const digits = index.toString();
    if (!width) return digits;
    return digits.padStart(Number(width), zero ? "0" : " ");
  });
}
