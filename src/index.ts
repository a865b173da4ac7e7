// SCDL - Simplicial Complex Description Language
// Main exports

//==============================================================================
// Types
//==============================================================================

export type {
	AssignCmd, Command, ComplexDeclCmd, ComplexJSON, ComplexLitExpr, Expr,
	FunCallExpr, FunctionDeclCmd, IdentExpr, IfCmd, IntLitExpr, MappingPair,
	OpCallExpr, Program, ProgramDocument, VertexDeclCmd, WhileCmd,
	// Runtime values
	ClosureVal, ComplexVal, DVal, EVal, IntVal, LocVal, OperatorVal, VertexVal,
} from "./types.ts";

export type { Environment, State } from "./env.ts";

export type { ErrorCode, ValidationError, ValidationResult } from "./errors.ts";

export type {
	ArgKind, ArithmeticOperator, ConstructiveOperator, ObservationalOperator,
	Operator, OperatorRegistry,
} from "./domains/registry.ts";

export type { Simplex, VertexName } from "./complex.ts";
export type { ReadonlyUnionFind } from "./union-find.ts";
export type { VertexMapping } from "./algebra.ts";
export type { Gf2Matrix } from "./homology.ts";
export type { ComplexGraph } from "./serialize.ts";
export type { CommandResult, EvalContext, EvalOptions } from "./evaluator/types.ts";
export type { RunResult } from "./evaluator/program.ts";

//==============================================================================
// Value Constructors and Guards
//==============================================================================

export {
	closureVal, complexVal, intVal, locVal, operatorVal, vertexVal,
	isClosure, isComplex, isEVal, isInt,
} from "./types.ts";

//==============================================================================
// Errors
//==============================================================================

export { ErrorCodes, SCDLError } from "./errors.ts";

//==============================================================================
// Complexes and Algebra
//==============================================================================

export { UnionFind } from "./union-find.ts";
export { Complex, MAX_FACE_VERTICES, faces, simplexKey } from "./complex.ts";
export { glue, join, pickVertex, union } from "./algebra.ts";

//==============================================================================
// Homology
//==============================================================================

export {
	bettiNumber, boundaryMatrix, computeHomology, eulerCharacteristic,
	kSimplices, orderedSimplex, rankMod2, skeletonMap,
} from "./homology.ts";

//==============================================================================
// Environment and State
//==============================================================================

export {
	access, allocate, emptyEnvironment, emptyState, ensureVertexOrder,
	extendEnvironment, extendEnvironmentMany, freshVertex, highWaterMark,
	lookup, rollback, update,
} from "./env.ts";

//==============================================================================
// Operators
//==============================================================================

export {
	applyOperator, createRegistry, lookupOperator, mergeRegistries, registerOperator,
} from "./domains/registry.ts";
export { createConstructiveRegistry } from "./domains/constructive.ts";
export { createObservationalRegistry } from "./domains/observational.ts";
export { createArithmeticRegistry } from "./domains/arithmetic.ts";

//==============================================================================
// Evaluator
//==============================================================================

export { evaluateExpr } from "./evaluator/expr.ts";
export { executeCommand, executeSequence } from "./evaluator/commands.ts";
export {
	createStandardRegistry, evaluateProgram, initialEnvState, runProgram,
} from "./evaluator/program.ts";
export {
	DEFAULT_MAX_CALL_DEPTH, DEFAULT_MAX_ITERATIONS, createEvalContext,
} from "./evaluator/types.ts";

//==============================================================================
// Validation and Serialization
//==============================================================================

export { validateComplexJSON, validateProgram } from "./validator.ts";
export { collectComplexes, complexGraph, serializeComplex } from "./serialize.ts";
