/**
 * Type Guard Utilities
 * Safe type checking functions
 */

/**
 * Check if value is a record (object, not array, not null)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if value is a plain object literal (not a Date, ObjectId or other class instance)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (!isRecord(value)) {
		return false;
	}
	const proto: unknown = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

export function isString(value: unknown): value is string {
	return typeof value === 'string';
}

export function isNonEmptyString(value: unknown): value is string {
	return isString(value) && value.trim().length > 0;
}
