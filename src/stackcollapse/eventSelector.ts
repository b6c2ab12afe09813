import type { Sample, SampleSource } from '../commonTypes';
import { UnknownEventTypeError } from '../errors';
import { logger } from '../logger';

export interface EventSelection {
    // Undefined only when no filter was given and the session has no samples.
    eventType: string | undefined,
    samples: Iterable<Sample>,
};

function* filterByEventType(samples: Iterator<Sample>, eventType: string, first?: Sample): Generator<Sample> {
    if (first) {
        yield first;
    }

    for (let next = samples.next(); !next.done; next = samples.next()) {
        if (next.value.eventType === eventType) {
            yield next.value;
        }
    }
}

/**
 * Picks the single event type to fold. Without a filter the first sample's
 * event type wins; that sample is held back and replayed so the source is
 * still read only once.
 */
export function selectEventType(source: SampleSource, eventFilter?: string): EventSelection {
    const eventTypes = source.eventTypes();

    if (eventFilter !== undefined) {
        if (!eventTypes.includes(eventFilter)) {
            throw new UnknownEventTypeError(eventFilter, eventTypes);
        }

        return {
            eventType: eventFilter,
            samples: filterByEventType(source.samples()[Symbol.iterator](), eventFilter),
        };
    }

    const iterator = source.samples()[Symbol.iterator]();
    const first = iterator.next();
    if (first.done) {
        return { eventType: undefined, samples: [] };
    }

    const eventType = first.value.eventType;
    if (eventTypes.length > 1) {
        logger.warn(`Input has multiple event types (${eventTypes.join(", ")}). Using the first one found: ${eventType}. Use --event-filter to choose another.`);
    } else {
        logger.debug(`Using event type: ${eventType}`);
    }

    return {
        eventType,
        samples: filterByEventType(iterator, eventType, first.value),
    };
}
