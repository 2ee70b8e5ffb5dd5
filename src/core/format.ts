const FORMAT_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
const DAY_MS = 86_400_000;

const toValidDate = (value: Date | number | null | undefined): Date | null => {
	if (value === null || value === undefined) return null;

	const date = value instanceof Date ? value : new Date(value);
	if (Number.isNaN(date.getTime())) return null;

	return date;
};

export const human = (bytes: number | null | undefined): string => {
	if (bytes === 0) return '0 B';
	if (typeof bytes !== 'number' || !Number.isFinite(bytes) || bytes < 0) {
		return '-';
	}

	const unitIndex = Math.min(
		Math.floor(Math.log(bytes) / Math.log(1024)),
		FORMAT_UNITS.length - 1,
	);
	const value = bytes / 1024 ** unitIndex;
	const decimals = value >= 10 || unitIndex === 0 ? 0 : 1;

	return `${value.toFixed(decimals)} ${FORMAT_UNITS[unitIndex]}`;
};

export const timeAgo = (
	value: Date | number | null | undefined,
	now = Date.now(),
): string => {
	const date = toValidDate(value);
	if (!date) return '';

	const seconds = Math.max(0, Math.floor((now - date.getTime()) / 1000));
	let interval = seconds / 31_536_000;
	if (interval >= 1) return `${Math.floor(interval)}y ago`;

	interval = seconds / 2_592_000;
	if (interval >= 1) return `${Math.floor(interval)}mo ago`;

	interval = seconds / 86_400;
	if (interval >= 1) return `${Math.floor(interval)}d ago`;

	interval = seconds / 3600;
	if (interval >= 1) return `${Math.floor(interval)}h ago`;

	interval = seconds / 60;
	if (interval >= 1) return `${Math.floor(interval)}m ago`;

	return `${seconds}s ago`;
};

/** Whole days since `value`; never negative. */
export const ageInDays = (
	value: Date | number | null | undefined,
	now = Date.now(),
): number | null => {
	const date = toValidDate(value);
	if (!date) return null;
	return Math.max(0, Math.floor((now - date.getTime()) / DAY_MS));
};

export const formatDays = (days: number | null): string => {
	if (days === null) return 'unknown age';
	return days === 1 ? '1 day' : `${days} days`;
};

export const truncateMiddle = (value: string, maxLength: number): string => {
	if (maxLength <= 3 || value.length <= maxLength) return value;
	const headLength = Math.ceil((maxLength - 3) / 2);
	const tailLength = Math.floor((maxLength - 3) / 2);
	return `${value.slice(0, headLength)}...${value.slice(-tailLength)}`;
};
