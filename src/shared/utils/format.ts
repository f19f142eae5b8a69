import { config } from '@config/app.config.js';
import { formatAmount } from './money.js';

type DatePart = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second';

function zonedParts(date: Date, timeZone: string): Record<DatePart, string> {
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

  const lookup = (type: DatePart) => parts.find((part) => part.type === type)?.value ?? '00';
  return {
    year: lookup('year'),
    month: lookup('month'),
    day: lookup('day'),
    hour: lookup('hour'),
    minute: lookup('minute'),
    second: lookup('second'),
  };
}

/** Calendar date in `timeZone` as YYYYMMDD. */
export function dateStamp(date: Date, timeZone = config.registration.timeZone): string {
  const { year, month, day } = zonedParts(date, timeZone);
  return `${year}${month}${day}`;
}

/** YYYY-MM-DD HH:mm:ss in the registration time zone. */
export function formatDateTime(date: Date, timeZone = config.registration.timeZone): string {
  const { year, month, day, hour, minute, second } = zonedParts(date, timeZone);
  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}

/** YYYY-MM-DD in the registration time zone. */
export function formatDate(date: Date, timeZone = config.registration.timeZone): string {
  return formatDateTime(date, timeZone).slice(0, 10);
}

export function formatMoney(amount: string, currency = config.payments.currency): string {
  return `${currency} ${formatAmount(amount)}`;
}

/** School shown on documents; falls back to the pre-migration free text. */
export function schoolNameOf(registration: {
  school: { name: string } | null;
  legacySchoolName: string | null;
}): string {
  return registration.school?.name ?? registration.legacySchoolName ?? '';
}
