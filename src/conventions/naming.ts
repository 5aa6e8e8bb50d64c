import type { OperationKind, OperationName } from "../types/index.js";
import { LayerKitError } from "../utils/errors.js";

const KEBAB_CASE = /^[a-z0-9]+(?:-[a-z0-9]+)*$/;
const CAMEL_CASE = /^[a-z][a-zA-Z0-9]*$/;
const PASCAL_CASE = /^[A-Z][a-zA-Z0-9]*$/;
const CONSTANT_CASE = /^[A-Z][A-Z0-9]*(?:_[A-Z0-9]+)*$/;

// Words that end the entity part of an operation name: "get user by id"
const ENTITY_TERMINATORS = new Set(["by", "for", "with", "from"]);

const VERB_KINDS: Record<string, OperationKind> = {
	list: "read-many",
	search: "read-many",
	get: "read-one",
	find: "read-one",
	fetch: "read-one",
	load: "read-one",
	read: "read-one",
	create: "create",
	add: "create",
	insert: "create",
	register: "create",
	update: "update",
	edit: "update",
	set: "update",
	rename: "update",
	save: "update",
	change: "update",
	delete: "delete",
	remove: "delete",
	destroy: "delete",
	archive: "delete",
};

export function splitWords(input: string): string[] {
	return input
		.replace(/([a-z0-9])([A-Z])/g, "$1 $2")
		.replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
		.split(/[^a-zA-Z0-9]+/)
		.filter(Boolean)
		.map((word) => word.toLowerCase());
}

function capitalize(word: string): string {
	return word.charAt(0).toUpperCase() + word.slice(1);
}

export function toKebabCase(input: string | string[]): string {
	const words = Array.isArray(input) ? input : splitWords(input);
	return words.join("-");
}

export function toCamelCase(input: string | string[]): string {
	const words = Array.isArray(input) ? input : splitWords(input);
	return words
		.map((word, index) => (index === 0 ? word : capitalize(word)))
		.join("");
}

export function toPascalCase(input: string | string[]): string {
	const words = Array.isArray(input) ? input : splitWords(input);
	return words.map(capitalize).join("");
}

export function isKebabCase(name: string): boolean {
	return KEBAB_CASE.test(name);
}

export function isCamelCase(name: string): boolean {
	return CAMEL_CASE.test(name);
}

export function isPascalCase(name: string): boolean {
	return PASCAL_CASE.test(name);
}

export function isConstantCase(name: string): boolean {
	return CONSTANT_CASE.test(name);
}

export function pluralize(word: string): string {
	if (/[^aeiou]y$/.test(word)) return `${word.slice(0, -1)}ies`;
	if (/(s|x|z|ch|sh)$/.test(word)) {
		return word.endsWith("s") && !word.endsWith("ss") ? word : `${word}es`;
	}
	return `${word}s`;
}

export function singularize(word: string): string {
	if (word.endsWith("ies") && word.length > 3) return `${word.slice(0, -3)}y`;
	if (/(ss|x|z|ch|sh)es$/.test(word)) return word.slice(0, -2);
	if (word.endsWith("s") && !word.endsWith("ss")) return word.slice(0, -1);
	return word;
}

/** Entity words with the last one made singular: ["user", "settings"] gives ["user", "setting"]. */
export function singularEntity(entityWords: string[]): string[] {
	if (entityWords.length === 0) return entityWords;
	return [...entityWords.slice(0, -1), singularize(entityWords[entityWords.length - 1] ?? "")];
}

function resolveKind(verb: string, words: string[], entityWords: string[]): OperationKind {
	const kind = VERB_KINDS[verb] ?? "custom";
	if (kind !== "read-one") return kind;

	if (words.includes("by")) return "read-one";
	const last = entityWords[entityWords.length - 1] ?? "";
	return singularize(last) === last ? "read-one" : "read-many";
}

/**
 * Parse a human-written operation name ("create post", "getUserById",
 * "delete-comment") into its verb, entity and kind.
 *
 * The entity is everything after the verb up to the first "by", "for",
 * "with" or "from"; pass `entity` to override it.
 */
export function parseOperationName(
	input: string,
	entity?: string,
): OperationName {
	const words = splitWords(input);

	if (words.length < 2) {
		throw new LayerKitError(
			"INVALID_NAME",
			`"${input}" needs a verb and a noun, e.g. "create post"`,
			{ input },
		);
	}

	const leadingDigit = words.find((word) => /^[0-9]/.test(word));
	if (leadingDigit) {
		throw new LayerKitError(
			"INVALID_NAME",
			`"${input}" contains a word starting with a digit ("${leadingDigit}")`,
			{ input },
		);
	}

	const [verb, ...rest] = words;

	let entityWords: string[];
	if (entity !== undefined) {
		entityWords = splitWords(entity);
	} else {
		const end = rest.findIndex((word) => ENTITY_TERMINATORS.has(word));
		entityWords = end === -1 ? rest : rest.slice(0, end);
	}

	if (entityWords.length === 0) {
		throw new LayerKitError(
			"INVALID_NAME",
			`Could not find an entity in "${input}"; pass --entity`,
			{ input },
		);
	}

	return {
		input,
		words,
		verb,
		entityWords,
		kind: resolveKind(verb, words, entityWords),
	};
}
