import { layerFunctionName } from "../../conventions/layers.js";
import {
	pluralize,
	singularEntity,
	toCamelCase,
	toPascalCase,
} from "../../conventions/naming.js";
import type {
	ImportSpec,
	LayerKitConfig,
	ModuleParts,
	OperationName,
} from "../../types/index.js";

function withLastWord(words: string[], transform: (word: string) => string) {
	return [...words.slice(0, -1), transform(words[words.length - 1] ?? "")];
}

/** Drizzle table identifier, e.g. "users" for entity "user". */
export function drizzleTableName(op: OperationName): string {
	return toCamelCase(withLastWord(op.entityWords, pluralize));
}

/** Prisma client accessor, e.g. "user" for entity "users". */
export function prismaModelName(op: OperationName): string {
	return toCamelCase(singularEntity(op.entityWords));
}

function drizzleFunction(fn: string, op: OperationName, table: string): string {
	switch (op.kind) {
		case "read-one":
			return `/**
 * Look up a single row by id. Returns null when nothing matches.
 */
export async function ${fn}(id: string) {
	const result = await db.select().from(${table}).where(eq(${table}.id, id)).limit(1);
	return result[0] ?? null;
}`;
		case "read-many":
			return `export async function ${fn}() {
	return db.select().from(${table});
}`;
		case "create":
			return `export async function ${fn}(data: typeof ${table}.$inferInsert) {
	const [row] = await db.insert(${table}).values(data).returning();
	return row;
}`;
		case "update":
			return `export async function ${fn}(
	id: string,
	data: Partial<typeof ${table}.$inferInsert>,
) {
	const [row] = await db
		.update(${table})
		.set(data)
		.where(eq(${table}.id, id))
		.returning();
	return row ?? null;
}`;
		case "delete":
			return `export async function ${fn}(id: string) {
	await db.delete(${table}).where(eq(${table}.id, id));
}`;
		case "custom":
			return customFunction(fn);
	}
}

function prismaFunction(fn: string, op: OperationName, model: string): string {
	const type = toPascalCase(singularEntity(op.entityWords));
	switch (op.kind) {
		case "read-one":
			return `/**
 * Look up a single record by id. Returns null when nothing matches.
 */
export async function ${fn}(id: string) {
	return db.${model}.findUnique({ where: { id } });
}`;
		case "read-many":
			return `export async function ${fn}() {
	return db.${model}.findMany();
}`;
		case "create":
			return `export async function ${fn}(data: Prisma.${type}CreateInput) {
	return db.${model}.create({ data });
}`;
		case "update":
			return `export async function ${fn}(id: string, data: Prisma.${type}UpdateInput) {
	return db.${model}.update({ where: { id }, data });
}`;
		case "delete":
			return `export async function ${fn}(id: string) {
	await db.${model}.delete({ where: { id } });
}`;
		case "custom":
			return customFunction(fn);
	}
}

function customFunction(fn: string): string {
	return `export async function ${fn}() {
	throw new Error("${fn} is not implemented");
}`;
}

function drizzleImports(op: OperationName, config: LayerKitConfig): ImportSpec[] {
	const table = drizzleTableName(op);
	const imports: ImportSpec[] = [{ from: "server-only" }];
	if (op.kind === "custom") return imports;

	if (op.kind === "read-one" || op.kind === "update" || op.kind === "delete") {
		imports.push({ from: "drizzle-orm", named: ["eq"] });
	}
	imports.push({ from: config.db.clientModule, named: ["db"] });
	imports.push({ from: config.db.schemaModule, named: [table] });
	return imports;
}

function prismaImports(op: OperationName, config: LayerKitConfig): ImportSpec[] {
	const imports: ImportSpec[] = [{ from: "server-only" }];
	if (op.kind === "custom") return imports;

	if (op.kind === "create" || op.kind === "update") {
		imports.push({ from: "@prisma/client", named: ["Prisma"], typeOnly: true });
	}
	imports.push({ from: config.db.clientModule, named: ["db"] });
	return imports;
}

/**
 * Data access module for one operation: `import "server-only"` plus a
 * single query written for the configured ORM.
 */
export function generateDataAccessModule(
	op: OperationName,
	config: LayerKitConfig,
): ModuleParts {
	const fn = layerFunctionName("data-access", op, config);

	if (config.orm === "prisma") {
		return {
			directives: [],
			imports: prismaImports(op, config),
			body: prismaFunction(fn, op, prismaModelName(op)),
		};
	}

	return {
		directives: [],
		imports: drizzleImports(op, config),
		body: drizzleFunction(fn, op, drizzleTableName(op)),
	};
}
