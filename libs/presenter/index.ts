export type { PresentTarget, SingleTarget, PresenterConfig } from './presenter.js';
export { Presenter } from './presenter.js';
export { DecoratedRecord } from './decorator.js';
export type { ViewContext, DateFormatName, TagAttributes, HtmlViewContextOptions } from './viewContext.js';
export { HtmlViewContext, DATE_FORMATS, escapeHtml } from './viewContext.js';
export { distanceOfTimeInWords } from './distanceOfTime.js';
export type {
    DatetimeFormat,
    RelativeTimeOptions,
    TimeAgoOptions,
    TimeFromNowOptions,
    FormattingContext
} from './formatting.js';
export {
    NOT_AVAILABLE,
    BLANK_PLACEHOLDER,
    formattedDatetime,
    decoratedTimeAgoInWords,
    decoratedTimeFromNowInWords,
    formattedBoolean,
    indicateBlank
} from './formatting.js';
