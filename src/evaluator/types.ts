// Shared types and interfaces for the evaluator subsystem

import type { Environment, State } from "../env.ts";

//==============================================================================
// Evaluation Options
//==============================================================================

export const DEFAULT_MAX_ITERATIONS = 10_000_000;
export const DEFAULT_MAX_CALL_DEPTH = 512;

export interface EvalOptions {
	/** Body executions a single while loop may perform. */
	maxIterations?: number;
	/** Nesting limit for user function calls. */
	maxCallDepth?: number;
	/** Log every executed command. */
	trace?: boolean;
	log?: (line: string) => void;
}

//==============================================================================
// Evaluator Context
//==============================================================================

export interface EvalContext {
	maxIterations: number;
	maxCallDepth: number;
	callDepth: number;
	trace: boolean;
	log: (line: string) => void;
}

export function createEvalContext(options?: EvalOptions): EvalContext {
	return {
		maxIterations: options?.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		maxCallDepth: options?.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
		callDepth: 0,
		trace: options?.trace ?? false,
		log: options?.log ?? ((line) => { console.log(line); }),
	};
}

//==============================================================================
// Result types
//==============================================================================

export interface CommandResult {
	env: Environment;
	state: State;
}
