import { InvalidPatternError } from '../errors.js';

/**
 * Counts non-overlapping occurrences of a pattern.
 * The expression is compiled once, case-insensitive, with `.` spanning line breaks.
 */
export class PatternMatcher {
    readonly regex: RegExp;

    constructor(readonly pattern: string) {
        try {
            this.regex = new RegExp(pattern, 'gis');
        } catch (error) {
            throw new InvalidPatternError(pattern, error);
        }
    }

    count(body: string): number {
        if (!body) return 0;

        // matchAll works on a copy of the regex, so lastIndex on the shared instance never moves.
        let total = 0;
        for (const _match of body.matchAll(this.regex)) {
            total++;
        }
        return total;
    }
}
