// Command execution: ρ, σ ⊢ c ⇒ ρ', σ'

import type { Complex } from "../complex.ts";
import {
	type Environment,
	type State,
	allocate,
	ensureVertexOrder,
	extendEnvironment,
	freshVertex,
	highWaterMark,
	lookup,
	rollback,
	update,
} from "../env.ts";
import { SCDLError, exhaustive } from "../errors.ts";
import {
	type AssignCmd,
	type Command,
	type ComplexDeclCmd,
	type EVal,
	type Expr,
	type IfCmd,
	type WhileCmd,
	closureVal,
	describeKind,
	vertexVal,
} from "../types.ts";
import { evaluateExpr } from "./expr.ts";
import type { CommandResult, EvalContext } from "./types.ts";

//==============================================================================
// Sequencing
//==============================================================================

export function executeSequence(
	ctx: EvalContext,
	commands: readonly Command[],
	env: Environment,
	state: State,
): CommandResult {
	let current: CommandResult = { env, state };
	for (const cmd of commands) {
		current = executeCommand(ctx, cmd, current.env, current.state);
	}
	return current;
}

export function executeCommand(
	ctx: EvalContext,
	cmd: Command,
	env: Environment,
	state: State,
): CommandResult {
	if (ctx.trace) ctx.log("[Evaluator] " + describeCommand(cmd));

	switch (cmd.kind) {
		case "complexDecl":
			return execComplexDecl(ctx, cmd, env, state);
		case "vertexDecl": {
			const [name, next] = freshVertex(state);
			return { env: extendEnvironment(env, cmd.name, vertexVal(name)), state: next };
		}
		case "assign":
			return execAssign(ctx, cmd, env, state);
		case "if":
			return execIf(ctx, cmd, env, state);
		case "while":
			return execWhile(ctx, cmd, env, state);
		case "functionDecl":
			// the closure captures env before the name is bound
			return { env: extendEnvironment(env, cmd.name, closureVal(cmd, env)), state };
		default:
			return exhaustive(cmd);
	}
}

function describeCommand(cmd: Command): string {
	switch (cmd.kind) {
		case "complexDecl":
			return "complex " + cmd.name;
		case "vertexDecl":
			return "vertex " + cmd.name;
		case "assign":
			return "assign " + cmd.name;
		case "if":
			return "if";
		case "while":
			return "while";
		case "functionDecl":
			return "function " + cmd.name + "(" + cmd.params.join(", ") + ")";
		default:
			return exhaustive(cmd);
	}
}

//==============================================================================
// Helpers
//==============================================================================

function expectComplex(v: EVal, context: string): Complex {
	if (v.kind !== "complex") throw SCDLError.typeError("complex", describeKind(v), context);
	return v.value;
}

function evalCondition(ctx: EvalContext, cond: Expr, env: Environment, state: State): boolean {
	const v = evaluateExpr(ctx, cond, env, state);
	if (v.kind !== "int") throw SCDLError.typeError("integer", describeKind(v), "condition");
	return v.value !== 0;
}

/** Run a block; addresses it allocated are discarded on exit. */
function runBlock(
	ctx: EvalContext,
	commands: readonly Command[],
	env: Environment,
	state: State,
): State {
	const mark = highWaterMark(state);
	const after = executeSequence(ctx, commands, env, state);
	return rollback(after.state, mark);
}

//==============================================================================
// Declarations and assignment
//==============================================================================

function execComplexDecl(
	ctx: EvalContext,
	cmd: ComplexDeclCmd,
	env: Environment,
	state: State,
): CommandResult {
	const value = expectComplex(
		evaluateExpr(ctx, cmd.expr, env, state),
		"declaration of " + cmd.name,
	);
	const [loc, next] = allocate(ensureVertexOrder(state, value.vertices), value);
	return { env: extendEnvironment(env, cmd.name, loc), state: next };
}

function execAssign(
	ctx: EvalContext,
	cmd: AssignCmd,
	env: Environment,
	state: State,
): CommandResult {
	const target = lookup(env, cmd.name);
	if (target.kind !== "loc") throw SCDLError.notAVariable(cmd.name);
	const value = expectComplex(
		evaluateExpr(ctx, cmd.expr, env, state),
		"assignment to " + cmd.name,
	);
	return { env, state: update(state, target.addr, value) };
}

//==============================================================================
// Control flow
//==============================================================================

function execIf(ctx: EvalContext, cmd: IfCmd, env: Environment, state: State): CommandResult {
	const branch = evalCondition(ctx, cmd.cond, env, state) ? cmd.then : cmd.else;
	return { env, state: runBlock(ctx, branch, env, state) };
}

function execWhile(ctx: EvalContext, cmd: WhileCmd, env: Environment, state: State): CommandResult {
	let current = state;
	for (let iterations = 0; evalCondition(ctx, cmd.cond, env, current); iterations++) {
		if (iterations >= ctx.maxIterations) throw SCDLError.nonTermination(ctx.maxIterations);
		current = runBlock(ctx, cmd.body, env, current);
	}
	return { env, state: current };
}
