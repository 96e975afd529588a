const MINUTES_IN_DAY = 1440;
const MINUTES_IN_MONTH = 43200;
const MINUTES_IN_QUARTER_YEAR = 131400;
const MINUTES_IN_THREE_QUARTERS_YEAR = 394200;
const MINUTES_IN_YEAR = 525600;

function pluralize(count: number, unit: string): string {
    return `${count} ${count === 1 ? unit : `${unit}s`}`;
}

function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Leap days between two instants that are at least a year apart.
 * A year only counts when its 29 February lies between them.
 */
function leapDaysBetween(from: Date, to: Date): number {
    const fromYear = from.getUTCMonth() >= 2 ? from.getUTCFullYear() + 1 : from.getUTCFullYear();
    const toYear = to.getUTCMonth() < 2 ? to.getUTCFullYear() - 1 : to.getUTCFullYear();

    let leapDays = 0;
    for (let year = fromYear; year <= toYear; year++) {
        if (isLeapYear(year)) leapDays++;
    }
    return leapDays;
}

/**
 * Approximate distance between two instants in words, e.g. "about 3 hours".
 * Order of the arguments does not matter.
 */
export function distanceOfTimeInWords(fromTime: Date, toTime: Date): string {
    const [from, to] = fromTime.getTime() <= toTime.getTime() ? [fromTime, toTime] : [toTime, fromTime];
    const minutes = Math.round((to.getTime() - from.getTime()) / 60000);

    if (Number.isNaN(minutes)) {
        throw new RangeError('Invalid time value');
    }

    if (minutes === 0) return 'less than a minute';
    if (minutes === 1) return '1 minute';
    if (minutes < 45) return pluralize(minutes, 'minute');
    if (minutes < 90) return 'about 1 hour';
    if (minutes < MINUTES_IN_DAY) return `about ${pluralize(Math.round(minutes / 60), 'hour')}`;
    if (minutes < 2520) return '1 day';
    if (minutes < MINUTES_IN_MONTH) return pluralize(Math.round(minutes / MINUTES_IN_DAY), 'day');
    if (minutes < 2 * MINUTES_IN_MONTH) return `about ${pluralize(Math.round(minutes / MINUTES_IN_MONTH), 'month')}`;
    if (minutes < MINUTES_IN_YEAR) return pluralize(Math.round(minutes / MINUTES_IN_MONTH), 'month');

    const minutesWithoutLeapDays = minutes - leapDaysBetween(from, to) * MINUTES_IN_DAY;
    const remainder = minutesWithoutLeapDays % MINUTES_IN_YEAR;
    const years = Math.floor(minutesWithoutLeapDays / MINUTES_IN_YEAR);

    if (remainder < MINUTES_IN_QUARTER_YEAR) return `about ${pluralize(years, 'year')}`;
    if (remainder < MINUTES_IN_THREE_QUARTERS_YEAR) return `over ${pluralize(years, 'year')}`;
    return `almost ${pluralize(years + 1, 'year')}`;
}
