import { distanceOfTimeInWords } from './distanceOfTime.js';
import { getPreproConfig, type PreproConfig } from '../bootstrap/config/prepro-config.js';

export const DATE_FORMATS = {
    fullDateAndTime: { year: 'numeric', month: 'long', day: 'numeric', hour: 'numeric', minute: '2-digit' },
    longDate: { year: 'numeric', month: 'long', day: 'numeric' },
    shortDate: { month: 'short', day: 'numeric' },
    time: { hour: 'numeric', minute: '2-digit' }
} as const satisfies Record<string, Intl.DateTimeFormatOptions>;

export type DateFormatName = keyof typeof DATE_FORMATS | 'iso8601';

export type TagAttributes = Readonly<Record<string, string>>;

/**
 * The presentation environment decorated records render through.
 * Adopting applications may supply their own; HtmlViewContext is the default.
 */
export interface ViewContext {
    now(): Date;
    timeAgoInWords(date: Date): string;
    contentTag(name: string, content: string, attributes?: TagAttributes): string;
    formatDate(date: Date, format: DateFormatName): string;
}

export interface HtmlViewContextOptions {
    readonly locale?: string;
    readonly timeZone?: string;
    readonly clock?: () => Date;
    /** Defaults to the process configuration */
    readonly config?: PreproConfig;
}

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9-]*$/;

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export class HtmlViewContext implements ViewContext {
    private readonly locale: string;
    private readonly timeZone: string;
    private readonly clock: () => Date;

    constructor(options: HtmlViewContextOptions = {}) {
        const needsConfig = options.locale === undefined || options.timeZone === undefined;
        const config = needsConfig ? options.config ?? getPreproConfig() : undefined;

        this.locale = options.locale ?? config?.locale ?? 'en-US';
        this.timeZone = options.timeZone ?? config?.timeZone ?? 'UTC';
        this.clock = options.clock ?? (() => new Date());
    }

    now(): Date {
        return this.clock();
    }

    timeAgoInWords(date: Date): string {
        return distanceOfTimeInWords(date, this.now());
    }

    contentTag(name: string, content: string, attributes: TagAttributes = {}): string {
        if (!NAME_PATTERN.test(name)) {
            throw new Error(`Invalid tag name: ${name}`);
        }

        const rendered = Object.entries(attributes).map(([key, value]) => {
            if (!NAME_PATTERN.test(key)) {
                throw new Error(`Invalid attribute name: ${key}`);
            }
            return ` ${key}="${escapeHtml(value)}"`;
        }).join('');

        return `<${name}${rendered}>${escapeHtml(content)}</${name}>`;
    }

    formatDate(date: Date, format: DateFormatName): string {
        if (format === 'iso8601') {
            return date.toISOString();
        }
        return new Intl.DateTimeFormat(this.locale, { ...DATE_FORMATS[format], timeZone: this.timeZone }).format(date);
    }
}
