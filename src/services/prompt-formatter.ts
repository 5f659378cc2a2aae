/**
 * Prompt Augmentation Formatter
 *
 * Turns retrieved taste records into sentences that can be appended to a
 * generation prompt, scaling amounts to the requested serving count.
 */

import type { Quantity, TasteMatch } from '../models/taste-record.js';
import { DISPLAY_DEFAULTS } from '../constants/taste-constants.js';

export const PREFERENCES_PREFIX = 'Personalized taste preferences:';

export class PromptFormatter {
	/**
	 * One sentence for the top match, or a no-match notice
	 *
	 * The sentence names the queried ingredient, not the stored one: a
	 * similar record ("sea salt") answers for what was asked ("salt").
	 */
	format(match: TasteMatch | undefined, queriedIngredient: string, requestedServings: number): string {
		if (!match) {
			return `No preference found for '${queriedIngredient}'.`;
		}
		return `${this.clause(match, queriedIngredient, requestedServings)}.`;
	}

	/**
	 * Several matches as one preamble; empty when there are none
	 *
	 * Each clause names its record's stored ingredient.
	 */
	formatAll(matches: TasteMatch[], requestedServings: number): string {
		if (matches.length === 0) {
			return '';
		}
		const clauses = matches.map((match) => this.clause(match, match.record.ingredient, requestedServings));
		return `${PREFERENCES_PREFIX} ${clauses.join('; ')}.`;
	}

	private clause(match: TasteMatch, displayIngredient: string, requestedServings: number): string {
		const { record, score } = match;
		const ingredient = displayIngredient.trim() || DISPLAY_DEFAULTS.INGREDIENT;
		const cuisine = record.cuisine || DISPLAY_DEFAULTS.CUISINE;
		const unit = record.unit ? ` ${record.unit}` : '';
		const evidence = `(similarity ${score.toFixed(2)}, feedback weight ${formatNumber(record.feedbackWeight)})`;

		const factor = scalingFactor(record.amount, record.servings, requestedServings);
		if (factor !== null && typeof record.amount === 'number') {
			const adjusted = round2(record.amount * factor);
			return `For ${ingredient}, use ${formatNumber(adjusted)}${unit} for ${requestedServings} servings in ${cuisine} cuisine ${evidence}`;
		}

		const amount = displayQuantity(record.amount);
		const servings = displayQuantity(record.servings);
		return (
			`For ${ingredient}, the user previously used ${amount ?? DISPLAY_DEFAULTS.AMOUNT}${amount === null ? '' : unit} ` +
			`for ${servings ?? DISPLAY_DEFAULTS.SERVINGS} servings in ${cuisine} cuisine ${evidence}`
		);
	}
}

/**
 * requested / stored servings, or null when the record cannot be scaled
 */
export function scalingFactor(amount: Quantity, servings: Quantity, requestedServings: number): number | null {
	if (typeof amount !== 'number' || typeof servings !== 'number' || servings <= 0) {
		return null;
	}
	if (!Number.isFinite(requestedServings) || requestedServings <= 0) {
		return null;
	}
	return requestedServings / servings;
}

export function round2(value: number): number {
	return Math.round((value + Number.EPSILON) * 100) / 100;
}

function formatNumber(value: number): string {
	return String(round2(value));
}

function displayQuantity(value: Quantity): string | null {
	if (typeof value === 'number') {
		return formatNumber(value);
	}
	return value.trim() === '' ? null : value;
}
