// Expression evaluation: ρ, σ ⊢ e ⇓ v (no state change)

import type { VertexMapping } from "../algebra.ts";
import { Complex } from "../complex.ts";
import { applyOperator } from "../domains/registry.ts";
import { type Environment, type State, access, extendEnvironmentMany, lookup } from "../env.ts";
import { SCDLError, exhaustive } from "../errors.ts";
import {
	type DVal,
	type EVal,
	type Expr,
	type FunCallExpr,
	type MappingPair,
	type OpCallExpr,
	complexVal,
	intVal,
} from "../types.ts";
import type { EvalContext } from "./types.ts";

export function evaluateExpr(
	ctx: EvalContext,
	expr: Expr,
	env: Environment,
	state: State,
): EVal {
	switch (expr.kind) {
		case "ident":
			return evalIdent(expr.name, env, state);
		case "complexLit":
			return complexVal(Complex.fromVertices(expr.vertices));
		case "int":
			if (!Number.isSafeInteger(expr.value)) throw SCDLError.integerOverflow("literal", expr.value);
			return intVal(expr.value);
		case "opCall":
			return evalOpCall(ctx, expr, env, state);
		case "funCall":
			return evalFunCall(ctx, expr, env, state);
		default:
			return exhaustive(expr);
	}
}

/**
 * Addresses are dereferenced; raw vertex names become one-vertex complexes.
 */
function evalIdent(name: string, env: Environment, state: State): EVal {
	const dval: DVal = lookup(env, name);
	switch (dval.kind) {
		case "loc":
			return complexVal(access(state, dval));
		case "vertex":
			return complexVal(Complex.singleton(dval.name));
		case "complex":
		case "int":
		case "closure":
			return dval;
		case "operator":
			throw SCDLError.notAValue(name);
		default:
			return exhaustive(dval);
	}
}

function toVertexMapping(pairs: readonly MappingPair[] | undefined): VertexMapping | undefined {
	return pairs?.map((p) => [p.from, p.to] as const);
}

function evalArgs(ctx: EvalContext, args: readonly Expr[], env: Environment, state: State): EVal[] {
	return args.map((arg) => evaluateExpr(ctx, arg, env, state));
}

function evalOpCall(ctx: EvalContext, expr: OpCallExpr, env: Environment, state: State): EVal {
	const dval = lookup(env, expr.op);
	if (dval.kind !== "operator") throw SCDLError.notAnOperator(expr.op);
	const args = evalArgs(ctx, expr.args, env, state);
	return applyOperator(dval.op, args, toVertexMapping(expr.mapping), state);
}

/**
 * Lexical scoping: parameters extend the closure's captured environment;
 * the body reads the caller's current state.
 */
function evalFunCall(ctx: EvalContext, expr: FunCallExpr, env: Environment, state: State): EVal {
	const dval = lookup(env, expr.name);
	if (dval.kind !== "closure") throw SCDLError.notAFunction(expr.name);

	const { params, body } = dval.fn;
	if (expr.args.length !== params.length) {
		throw SCDLError.arityError(params.length, expr.args.length, expr.name);
	}
	const args = evalArgs(ctx, expr.args, env, state);
	const bindings: [string, DVal][] = [];
	args.forEach((value, i) => {
		const param = params[i];
		if (param !== undefined) bindings.push([param, value]);
	});
	const callEnv = extendEnvironmentMany(dval.env, bindings);

	if (ctx.callDepth >= ctx.maxCallDepth) throw SCDLError.recursionLimit(ctx.maxCallDepth);
	ctx.callDepth++;
	try {
		return evaluateExpr(ctx, body, callEnv, state);
	} finally {
		ctx.callDepth--;
	}
}
