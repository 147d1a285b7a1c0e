/**
 * EMA with smoothing factor 2/(length+1), seeded by the simple average of the
 * first `length` values. Entries before index `length - 1` are null.
 */
export function emaSeries(
	values: readonly number[],
	length: number
): Array<number | null> {
	const series: Array<number | null> = new Array(values.length).fill(null);

	if (length <= 0 || values.length < length) {
		return series;
	}

	const multiplier = 2 / (length + 1);
	let emaValue = average(values.slice(0, length));
	series[length - 1] = emaValue;

	for (let i = length; i < values.length; i += 1) {
		emaValue = (values[i] - emaValue) * multiplier + emaValue;
		series[i] = emaValue;
	}

	return series;
}

const average = (nums: readonly number[]): number => {
	const sum = nums.reduce((acc, value) => acc + value, 0);
	return sum / nums.length;
};
