import type { PresentationContext } from '../context/requestContext.js';
import type { ViewContext } from './viewContext.js';
import {
    formattedDatetime,
    decoratedTimeAgoInWords,
    decoratedTimeFromNowInWords,
    formattedBoolean,
    indicateBlank,
    type DatetimeFormat,
    type TimeAgoOptions,
    type TimeFromNowOptions
} from './formatting.js';

/**
 * A record prepared for presentation: the record itself plus the context it
 * was presented in, so views can format values without re-threading the actor
 * or view context.
 */
export class DecoratedRecord<TRecord, TActor, TView extends ViewContext = ViewContext> {
    constructor(
        public readonly record: TRecord,
        public readonly context: PresentationContext<TActor, TView>
    ) { }

    get actor(): TActor {
        return this.context.actor;
    }

    get viewContext(): TView {
        return this.context.viewContext;
    }

    formattedDatetime(
        value: Date | null | undefined,
        format: DatetimeFormat,
        options: TimeAgoOptions & TimeFromNowOptions = {}
    ): string {
        return formattedDatetime(value, format, this.context, options);
    }

    decoratedTimeAgoInWords(value: Date, options: TimeAgoOptions = {}): string {
        return decoratedTimeAgoInWords(value, this.context, options);
    }

    decoratedTimeFromNowInWords(value: Date, options: TimeFromNowOptions = {}): string {
        return decoratedTimeFromNowInWords(value, this.context, options);
    }

    formattedBoolean(value: unknown): 'Yes' | 'No' {
        return formattedBoolean(value);
    }

    indicateBlank(): string {
        return indicateBlank(this.context);
    }
}
