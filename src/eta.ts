// 1590 -> "1d 2h 30m"; 0 -> "0m"
export function formatEta(totalMinutes: number): string {
  let rest = Math.max(0, Math.floor(totalMinutes));
  const parts: string[] = [];
  for (const [unit, size] of [['d', 24 * 60], ['h', 60]] as const) {
    if (rest >= size) {
      parts.push(`${Math.floor(rest / size)}${unit}`);
      rest %= size;
    }
  }
  if (rest > 0 || parts.length === 0) parts.push(`${rest}m`);
  return parts.join(' ');
}

// "flag mod-us" / "mod-us" -> 🇺🇸. Returns '' for anything that is not a two-letter region.
export function flagEmoji(flagClass: string | null | undefined): string {
  if (!flagClass) return '';
  const code = flagClass.trim().split('-').pop()?.toUpperCase() ?? '';
  if (!/^[A-Z]{2}$/.test(code)) return '';
  return String.fromCodePoint(...[...code].map(c => c.charCodeAt(0) + 127397));
}
