const WORLD_ZONES: Array<{ label: string; timeZone: string }> = [
  { label: 'UTC', timeZone: 'UTC' },
  { label: 'Eastern Time (ET)', timeZone: 'America/New_York' },
  { label: 'Central Time (CT)', timeZone: 'America/Chicago' },
  { label: 'Mountain Time (MT)', timeZone: 'America/Denver' },
  { label: 'Pacific Time (PT)', timeZone: 'America/Los_Angeles' },
  { label: 'Central European Time (CET)', timeZone: 'Europe/Berlin' },
  { label: 'Japan Standard Time (JST)', timeZone: 'Asia/Tokyo' },
  { label: 'Australian Eastern Time (AET)', timeZone: 'Australia/Sydney' },
];

/** `YYYY-MM-DD HH:MM:SS` in the given IANA zone. */
export function formatInZone(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string => parts.find(p => p.type === type)?.value ?? '00';
  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

export function worldClock(now: Date = new Date()): string {
  return WORLD_ZONES.map(z => `${z.label}: ${formatInZone(now, z.timeZone)}`).join('\n');
}
