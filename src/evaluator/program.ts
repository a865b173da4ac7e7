// Program-level evaluation and the result envelope for API layers

import { createArithmeticRegistry } from "../domains/arithmetic.ts";
import { createConstructiveRegistry } from "../domains/constructive.ts";
import { createObservationalRegistry } from "../domains/observational.ts";
import { type OperatorRegistry, mergeRegistries } from "../domains/registry.ts";
import {
	type Environment,
	type State,
	emptyEnvironment,
	emptyState,
	extendEnvironmentMany,
} from "../env.ts";
import { type ErrorCode, SCDLError } from "../errors.ts";
import { collectComplexes } from "../serialize.ts";
import { type ComplexJSON, type Program, operatorVal } from "../types.ts";
import { validateProgram } from "../validator.ts";
import { executeSequence } from "./commands.ts";
import { type CommandResult, type EvalOptions, createEvalContext } from "./types.ts";

//==============================================================================
// Initial environment
//==============================================================================

export function createStandardRegistry(): OperatorRegistry {
	return mergeRegistries(
		createConstructiveRegistry(),
		createObservationalRegistry(),
		createArithmeticRegistry(),
	);
}

/** Built-in operators bound by name, and a fresh state. */
export function initialEnvState(
	registry: OperatorRegistry = createStandardRegistry(),
): { env: Environment; state: State } {
	const env = extendEnvironmentMany(
		emptyEnvironment(),
		[...registry].map(([name, op]) => [name, operatorVal(op)] as const),
	);
	return { env, state: emptyState() };
}

//==============================================================================
// Evaluation
//==============================================================================

export function evaluateProgram(program: Program, options?: EvalOptions): CommandResult {
	const { env, state } = initialEnvState();
	return executeSequence(createEvalContext(options), program, env, state);
}

export type RunResult =
	| { success: true; complexes: Record<string, ComplexJSON> }
	| { success: false; error: string; code: ErrorCode };

/**
 * Validate and run an untrusted document. Evaluation errors are reported in
 * the result; anything that is not an SCDLError is rethrown.
 */
export function runProgram(doc: unknown, options?: EvalOptions): RunResult {
	const validation = validateProgram(doc);
	if (!validation.valid) {
		const err = SCDLError.validation(validation.errors);
		return { success: false, error: err.message, code: err.code };
	}
	try {
		const { env, state } = evaluateProgram(validation.value.commands, options);
		return { success: true, complexes: collectComplexes(env, state) };
	} catch (err) {
		if (err instanceof SCDLError) {
			return { success: false, error: err.message, code: err.code };
		}
		throw err;
	}
}
