import { logger } from '../logging/logger.js';
import type { DateFormatName, ViewContext } from './viewContext.js';

export const NOT_AVAILABLE = 'N/A';
export const BLANK_PLACEHOLDER = 'None Given';

export type DatetimeFormat = 'distanceInWords' | DateFormatName;

export interface RelativeTimeOptions {
    /** Drop a leading "1 ", so "in the last month" reads instead of "in the last 1 month" */
    readonly suppress1?: boolean;
    /** Plain text instead of a <span> carrying the absolute time as its title */
    readonly textOnly?: boolean;
}

export interface TimeAgoOptions extends RelativeTimeOptions {
    /** Printed after the time, default ' ago' */
    readonly suffix?: string;
}

export interface TimeFromNowOptions extends RelativeTimeOptions {
    /** Printed before the time, default 'in ' */
    readonly prefix?: string;
}

export interface FormattingContext {
    readonly viewContext: ViewContext;
}

function logFormattingFailure(helper: string, err: unknown): void {
    logger.debug({ component: 'Formatting', helper, err }, 'Formatting failed, rendering fallback');
}

function distanceWords(value: Date, viewContext: ViewContext, suppress1: boolean): string {
    const words = viewContext.timeAgoInWords(value).replace(/about /g, '');
    return suppress1 ? words.replace(/^1\s+/, '') : words;
}

function withAbsoluteTitle(text: string, value: Date, viewContext: ViewContext): string {
    return viewContext.contentTag('span', text, { title: viewContext.formatDate(value, 'fullDateAndTime') });
}

export function decoratedTimeAgoInWords(value: Date, context: FormattingContext, options: TimeAgoOptions = {}): string {
    const { suffix = ' ago', suppress1 = false, textOnly = false } = options;
    const { viewContext } = context;

    try {
        const text = distanceWords(value, viewContext, suppress1) + suffix;
        return textOnly ? text : withAbsoluteTitle(text, value, viewContext);
    } catch (err) {
        logFormattingFailure('decoratedTimeAgoInWords', err);
        return NOT_AVAILABLE;
    }
}

export function decoratedTimeFromNowInWords(value: Date, context: FormattingContext, options: TimeFromNowOptions = {}): string {
    const { prefix = 'in ', suppress1 = false, textOnly = false } = options;
    const { viewContext } = context;

    try {
        const text = prefix + distanceWords(value, viewContext, suppress1);
        return textOnly ? text : withAbsoluteTitle(text, value, viewContext);
    } catch (err) {
        logFormattingFailure('decoratedTimeFromNowInWords', err);
        return NOT_AVAILABLE;
    }
}

/**
 * Formats a timestamp either relative to now ('distanceInWords') or in a named date format.
 */
export function formattedDatetime(
    value: Date | null | undefined,
    format: DatetimeFormat,
    context: FormattingContext,
    options: TimeAgoOptions & TimeFromNowOptions = {}
): string {
    if (!value || Number.isNaN(value.getTime())) return NOT_AVAILABLE;
    const { viewContext } = context;

    try {
        if (format === 'distanceInWords') {
            return value.getTime() < viewContext.now().getTime()
                ? decoratedTimeAgoInWords(value, context, options)
                : decoratedTimeFromNowInWords(value, context, options);
        }
        return viewContext.formatDate(value, format);
    } catch (err) {
        logFormattingFailure('formattedDatetime', err);
        return NOT_AVAILABLE;
    }
}

export function formattedBoolean(value: unknown): 'Yes' | 'No' {
    return value ? 'Yes' : 'No';
}

export function indicateBlank(context: FormattingContext): string {
    return context.viewContext.contentTag('span', BLANK_PLACEHOLDER, { class: 'label' });
}
