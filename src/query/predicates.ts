import type { Predicate, PredicateValue } from './types.js';

type DateInput = Date | number;

function timestamp(date: DateInput): number {
  return typeof date === 'number' ? date : date.getTime();
}

/**
 * Entry point for building predicates to pass to `SearchForm.query()`.
 *
 * @example
 * form.query([
 *   predicates.at('document.type', 'blog-post'),
 *   predicates.dateAfter('my.blog-post.date', new Date('2024-01-01')),
 * ])
 */
export const predicates = {
  at(fragment: string, value: PredicateValue): Predicate {
    return ['at', fragment, value];
  },
  not(fragment: string, value: PredicateValue): Predicate {
    return ['not', fragment, value];
  },
  missing(fragment: string): Predicate {
    return ['missing', fragment];
  },
  has(fragment: string): Predicate {
    return ['has', fragment];
  },
  any(fragment: string, values: readonly PredicateValue[]): Predicate {
    return ['any', fragment, values];
  },
  in(fragment: string, values: readonly PredicateValue[]): Predicate {
    return ['in', fragment, values];
  },
  fulltext(fragment: string, value: string): Predicate {
    return ['fulltext', fragment, value];
  },
  similar(documentId: string, maxResults: number): Predicate {
    return ['similar', documentId, maxResults];
  },

  numberLessThan(fragment: string, upperBound: number): Predicate {
    return ['number.lt', fragment, upperBound];
  },
  numberGreaterThan(fragment: string, lowerBound: number): Predicate {
    return ['number.gt', fragment, lowerBound];
  },
  numberInRange(fragment: string, lowerBound: number, upperBound: number): Predicate {
    return ['number.inRange', fragment, lowerBound, upperBound];
  },

  // Dates travel as epoch milliseconds.
  dateBefore(fragment: string, before: DateInput): Predicate {
    return ['date.before', fragment, timestamp(before)];
  },
  dateAfter(fragment: string, after: DateInput): Predicate {
    return ['date.after', fragment, timestamp(after)];
  },
  dateBetween(fragment: string, after: DateInput, before: DateInput): Predicate {
    return ['date.between', fragment, timestamp(after), timestamp(before)];
  },
  dayOfMonth(fragment: string, day: number): Predicate {
    return ['date.day-of-month', fragment, day];
  },
  dayOfMonthBefore(fragment: string, day: number): Predicate {
    return ['date.day-of-month-before', fragment, day];
  },
  dayOfMonthAfter(fragment: string, day: number): Predicate {
    return ['date.day-of-month-after', fragment, day];
  },
  dayOfWeek(fragment: string, day: string | number): Predicate {
    return ['date.day-of-week', fragment, day];
  },
  month(fragment: string, month: string | number): Predicate {
    return ['date.month', fragment, month];
  },
  monthBefore(fragment: string, month: string | number): Predicate {
    return ['date.month-before', fragment, month];
  },
  monthAfter(fragment: string, month: string | number): Predicate {
    return ['date.month-after', fragment, month];
  },
  year(fragment: string, year: number): Predicate {
    return ['date.year', fragment, year];
  },
  hour(fragment: string, hour: number): Predicate {
    return ['date.hour', fragment, hour];
  },

  near(fragment: string, latitude: number, longitude: number, radius: number): Predicate {
    return ['geopoint.near', fragment, latitude, longitude, radius];
  },
};
