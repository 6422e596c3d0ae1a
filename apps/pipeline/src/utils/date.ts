import { format, isValid, parse } from "date-fns";

/**
 * Accepted match date layouts, tried in order
 */
const DATE_FORMATS = ["yyyy-MM-dd", "yyyy/MM/dd", "dd/MM/yyyy", "dd-MM-yyyy", "dd.MM.yyyy"];

const REFERENCE_DATE = new Date(Date.UTC(2000, 0, 1));

export const parseMatchDate = (value: string): Date | null => {
	const trimmed = value.trim();
	if (!trimmed) return null;

	for (const pattern of DATE_FORMATS) {
		const parsed = parse(trimmed, pattern, REFERENCE_DATE);
		if (isValid(parsed)) return parsed;
	}
	return null;
};

/**
 * Normalize a match date to `yyyy-MM-dd`; null when it cannot be read
 */
export const toISODate = (value: string | undefined): string | null => {
	if (!value) return null;
	const parsed = parseMatchDate(value);
	return parsed ? format(parsed, "yyyy-MM-dd") : null;
};
