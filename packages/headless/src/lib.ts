export function crc32(data: Uint8Array): string {
  let crc = 0xFFFFFFFF >>> 0;
  for (const byte of data) {
    let c = (crc ^ byte) & 0xFF;
    for (let k = 0; k < 8; k++) {
      const mask = -(c & 1);
      c = (c >>> 1) ^ (0xEDB88320 & mask);
    }
    crc = (crc >>> 8) ^ c;
  }
  crc = (~crc) >>> 0;
  return (crc >>> 0).toString(16).padStart(8, '0');
}

// Fingerprint of a run's log, stable across runs with the same seed and config.
export function logFingerprint(lines: readonly string[]): string {
  return crc32(new TextEncoder().encode(lines.join('\n')));
}

// Decimal or 0x-prefixed hex; `def` when missing or not a non-negative integer.
export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  if (s.startsWith('0x') || s.startsWith('0X')) {
    const h = parseInt(s.slice(2), 16);
    return Number.isFinite(h) ? h >>> 0 : def;
  }
  const n = Number(s);
  return s !== '' && Number.isInteger(n) && n >= 0 ? n : def;
}

export function parseFraction(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const n = Number(val.trim());
  return val.trim() !== '' && Number.isFinite(n) ? n : def;
}

// `--key value` pairs; a flag without a value becomes '1'. Bare words are positionals.
export function parseFlags(args: readonly string[]): { opts: Record<string, string>; positionals: string[] } {
  const opts: Record<string, string> = {};
  const positionals: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === undefined) continue;
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        opts[key] = next;
        i++;
      } else {
        opts[key] = '1';
      }
    } else {
      positionals.push(a);
    }
  }
  return { opts, positionals };
}
