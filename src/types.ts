// SCDL Type Definitions
// Runtime value domains: expression values (EVal) and denotable values (DVal)

import type { Complex, VertexName } from "./complex.ts";
import type { Operator } from "./domains/registry.ts";
import type { Environment } from "./env.ts";
import type { FunctionDeclCmd } from "./zod-schemas.ts";

export type {
	AssignCmd, Command, ComplexDeclCmd, ComplexJSON, ComplexLitExpr, Expr,
	FunCallExpr, FunctionDeclCmd, IdentExpr, IfCmd, IntLitExpr, MappingPair,
	OpCallExpr, Program, ProgramDocument, VertexDeclCmd, WhileCmd,
} from "./zod-schemas.ts";

//==============================================================================
// Expression Values (EVal)
//==============================================================================

export type EVal = ComplexVal | IntVal | ClosureVal;

export interface ComplexVal {
	kind: "complex";
	value: Complex;
}

/** Integers double as truth values: 0 is false, anything else is true. */
export interface IntVal {
	kind: "int";
	value: number;
}

export interface ClosureVal {
	kind: "closure";
	fn: FunctionDeclCmd;
	env: Environment;
}

//==============================================================================
// Denotable Values (DVal)
//==============================================================================

export type DVal = EVal | LocVal | VertexVal | OperatorVal;

/** Store address of a complex variable. */
export interface LocVal {
	kind: "loc";
	addr: number;
}

/** Name bound directly to a synthesized vertex. */
export interface VertexVal {
	kind: "vertex";
	name: VertexName;
}

export interface OperatorVal {
	kind: "operator";
	op: Operator;
}

//==============================================================================
// Value Constructors
//==============================================================================

export const complexVal = (value: Complex): ComplexVal => ({ kind: "complex", value });
export const intVal = (value: number): IntVal => ({ kind: "int", value });
export const closureVal = (fn: FunctionDeclCmd, env: Environment): ClosureVal => ({
	kind: "closure",
	fn,
	env,
});
export const locVal = (addr: number): LocVal => ({ kind: "loc", addr });
export const vertexVal = (name: VertexName): VertexVal => ({ kind: "vertex", name });
export const operatorVal = (op: Operator): OperatorVal => ({ kind: "operator", op });

//==============================================================================
// Type Guards
//==============================================================================

export function isEVal(v: DVal): v is EVal {
	return v.kind === "complex" || v.kind === "int" || v.kind === "closure";
}

export function isComplex(v: DVal): v is ComplexVal {
	return v.kind === "complex";
}

export function isInt(v: DVal): v is IntVal {
	return v.kind === "int";
}

export function isClosure(v: DVal): v is ClosureVal {
	return v.kind === "closure";
}

/** Human-readable kind for error messages. */
export function describeKind(v: DVal): string {
	switch (v.kind) {
		case "complex":
			return "complex";
		case "int":
			return "integer";
		case "closure":
			return "function";
		case "loc":
			return "address";
		case "vertex":
			return "vertex";
		case "operator":
			return "operator";
	}
}
