const DAY_MS = 24 * 60 * 60 * 1000;

export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return null;
  }
  if (typeof value === 'string' && !value.trim()) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

export function computeAgeDays(date: Date | null, now = new Date()): number | null {
  if (!date) {
    return null;
  }
  return (now.getTime() - date.getTime()) / DAY_MS;
}

export function formatDateYYYYMMDD(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function toIsoOrNull(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}
