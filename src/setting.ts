import type { Setting } from './types.d.ts';

export const unset: Setting<never> = Object.freeze({ set: false });

export function set<T>(value: T): Setting<T> {
	return { set: true, value };
}

export function settingOf<T>(value: T | undefined): Setting<T> {
	return typeof value === 'undefined' ? unset : set(value);
}

/** First setting that was provided, in order of precedence */
export function pick<T>(...settings: Setting<T>[]): Setting<T> {
	for (const setting of settings) {
		if (setting.set) return setting;
	}
	return unset;
}

export function valueOr<T>(setting: Setting<T>, fallback: T): T {
	return setting.set ? setting.value : fallback;
}
