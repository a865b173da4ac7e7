// SPDX-License-Identifier: MIT
// SCDL Operator Registry
// Closed set of operator variants sharing one apply contract

import type { VertexMapping } from "../algebra.ts";
import type { Complex, VertexName } from "../complex.ts";
import type { State } from "../env.ts";
import { SCDLError, exhaustive } from "../errors.ts";
import { type EVal, complexVal, describeKind, intVal } from "../types.ts";

//==============================================================================
// Operator Variants
//==============================================================================

export type ArgKind = "complex" | "int";

/** Binary complex operation, left-folded over two or more arguments. */
export interface FoldOperator {
	kind: "constructive";
	shape: "fold";
	name: string;
	fn: (a: Complex, b: Complex) => Complex;
}

export interface GlueOperator {
	kind: "constructive";
	shape: "glue";
	name: string;
	fn: (a: Complex, b: Complex, mapping: VertexMapping) => Complex;
}

/** Reads the global vertex order from the evaluation state. */
export interface PickOperator {
	kind: "constructive";
	shape: "pick";
	name: string;
	fn: (c: Complex, order: ReadonlyMap<VertexName, number>) => Complex;
}

export type ConstructiveOperator = FoldOperator | GlueOperator | PickOperator;

/** One complex, optionally followed by integers, to an integer. */
export interface ObservationalOperator {
	kind: "observational";
	name: string;
	params: ArgKind[];
	fn: (c: Complex, ...ints: number[]) => number;
}

export interface ArithmeticOperator {
	kind: "arithmetic";
	name: string;
	arity: number;
	fn: (...args: number[]) => number;
}

export type Operator = ConstructiveOperator | ObservationalOperator | ArithmeticOperator;

//==============================================================================
// Registry
//==============================================================================

export type OperatorRegistry = ReadonlyMap<string, Operator>;

export function registerOperator(registry: OperatorRegistry, op: Operator): OperatorRegistry {
	const next = new Map(registry);
	next.set(op.name, op);
	return next;
}

export function lookupOperator(registry: OperatorRegistry, name: string): Operator | undefined {
	return registry.get(name);
}

export function createRegistry(...ops: Operator[]): OperatorRegistry {
	return new Map(ops.map((op) => [op.name, op]));
}

export function mergeRegistries(...registries: OperatorRegistry[]): OperatorRegistry {
	const merged = new Map<string, Operator>();
	for (const registry of registries) {
		for (const [name, op] of registry) merged.set(name, op);
	}
	return merged;
}

//==============================================================================
// Argument Checking
//==============================================================================

function expectComplex(v: EVal, opName: string): Complex {
	if (v.kind === "complex") return v.value;
	throw SCDLError.typeError("complex", describeKind(v), opName + " argument");
}

function expectInt(v: EVal, opName: string): number {
	if (v.kind === "int") return v.value;
	throw SCDLError.typeError("integer", describeKind(v), opName + " argument");
}

function rejectMapping(op: Operator, mapping: VertexMapping | undefined): void {
	if (mapping !== undefined) {
		throw SCDLError.usage(op.name + " does not accept a mapping");
	}
}

//==============================================================================
// Apply
//==============================================================================

/**
 * Apply an operator to already evaluated arguments. Only `glue` takes a
 * mapping; only `pick_vert` reads the state.
 */
export function applyOperator(
	op: Operator,
	args: readonly EVal[],
	mapping: VertexMapping | undefined,
	state: State,
): EVal {
	switch (op.kind) {
		case "constructive":
			return complexVal(applyConstructive(op, args, mapping, state));
		case "observational":
			rejectMapping(op, mapping);
			return intVal(applyObservational(op, args));
		case "arithmetic":
			rejectMapping(op, mapping);
			return intVal(applyArithmetic(op, args));
		default:
			return exhaustive(op);
	}
}

function applyConstructive(
	op: ConstructiveOperator,
	args: readonly EVal[],
	mapping: VertexMapping | undefined,
	state: State,
): Complex {
	switch (op.shape) {
		case "glue": {
			if (mapping === undefined) throw SCDLError.usage("glue requires a mapping");
			const [a, b] = args;
			if (args.length !== 2 || a === undefined || b === undefined) {
				throw SCDLError.arityError(2, args.length, op.name);
			}
			return op.fn(expectComplex(a, op.name), expectComplex(b, op.name), mapping);
		}
		case "pick": {
			rejectMapping(op, mapping);
			const [c] = args;
			if (args.length !== 1 || c === undefined) {
				throw SCDLError.arityError(1, args.length, op.name);
			}
			return op.fn(expectComplex(c, op.name), state.vertexOrder);
		}
		case "fold": {
			rejectMapping(op, mapping);
			const [first, ...rest] = args.map((a) => expectComplex(a, op.name));
			if (first === undefined) throw SCDLError.arityError("at least 1", 0, op.name);
			return rest.reduce((acc, k) => op.fn(acc, k), first);
		}
		default:
			return exhaustive(op);
	}
}

function applyObservational(op: ObservationalOperator, args: readonly EVal[]): number {
	if (args.length !== op.params.length) {
		throw SCDLError.arityError(op.params.length, args.length, op.name);
	}
	const [head, ...tail] = args;
	if (head === undefined) throw SCDLError.arityError(op.params.length, 0, op.name);
	return op.fn(expectComplex(head, op.name), ...tail.map((a) => expectInt(a, op.name)));
}

function applyArithmetic(op: ArithmeticOperator, args: readonly EVal[]): number {
	if (args.length !== op.arity) {
		throw SCDLError.arityError(op.arity, args.length, op.name);
	}
	const result = op.fn(...args.map((a) => expectInt(a, op.name)));
	if (!Number.isSafeInteger(result)) throw SCDLError.integerOverflow(op.name, result);
	return result;
}
