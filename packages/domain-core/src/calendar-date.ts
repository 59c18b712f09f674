/**
 * Calendar Date
 *
 * A date without time of day or zone (birthdays, term start dates, lesson days).
 * `Date` always carries an instant, so date-only values get their own type and
 * serialize as `YYYY-MM-DD`.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export class CalendarDate {
	private constructor(
		readonly year: number,
		readonly month: number,
		readonly day: number,
	) {}

	/**
	 * @param month - 1-based month
	 * @throws RangeError for dates that do not exist (e.g. 2023-02-29)
	 */
	static of(year: number, month: number, day: number): CalendarDate {
		const candidate = new Date(Date.UTC(year, month - 1, day));
		if (
			!Number.isInteger(year) ||
			candidate.getUTCFullYear() !== year ||
			candidate.getUTCMonth() !== month - 1 ||
			candidate.getUTCDate() !== day
		) {
			throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
		}
		return new CalendarDate(year, month, day);
	}

	static parse(value: string): CalendarDate {
		const match = ISO_DATE.exec(value);
		if (!match) {
			throw new RangeError(`Invalid calendar date: ${value}`);
		}
		return CalendarDate.of(Number(match[1]), Number(match[2]), Number(match[3]));
	}

	/**
	 * Calendar date of an instant, in UTC.
	 */
	static fromDate(date: Date): CalendarDate {
		return new CalendarDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
	}

	equals(other: CalendarDate): boolean {
		return this.year === other.year && this.month === other.month && this.day === other.day;
	}

	toISOString(): string {
		const yyyy = String(this.year).padStart(4, '0');
		const mm = String(this.month).padStart(2, '0');
		const dd = String(this.day).padStart(2, '0');
		return `${yyyy}-${mm}-${dd}`;
	}

	toJSON(): string {
		return this.toISOString();
	}

	toString(): string {
		return this.toISOString();
	}
}
