// SCDL Error Types
// Error domain for complex algebra, evaluation and document validation

//==============================================================================
// Error Codes
//==============================================================================

export const ErrorCodes = {
	// Complex algebra
	IncompatibleIdentification: "IncompatibleIdentification",
	DegenerateSimplex: "DegenerateSimplex",
	VertexNotFound: "VertexNotFound",
	ConflictingMapping: "ConflictingMapping",
	DuplicateVertex: "DuplicateVertex",
	EmptyComplex: "EmptyComplex",
	SimplexTooLarge: "SimplexTooLarge",

	// Lookup errors
	UnboundIdentifier: "UnboundIdentifier",
	NotAValue: "NotAValue",
	NotAnOperator: "NotAnOperator",
	NotAFunction: "NotAFunction",
	NotAVariable: "NotAVariable",

	// Usage errors
	TypeError: "TypeError",
	ArityError: "ArityError",
	UsageError: "UsageError",
	IntegerOverflow: "IntegerOverflow",

	// Store errors
	UninitializedAddress: "UninitializedAddress",

	// Termination errors
	NonTermination: "NonTermination",

	// Validation errors
	ValidationError: "ValidationError",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

//==============================================================================
// SCDL Error Class
//==============================================================================

export class SCDLError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string) {
		super(message);
		this.name = "SCDLError";
		this.code = code;
	}

	/**
	 * Two shared vertices are identified in one operand but not the other.
	 */
	static incompatibleIdentification(context: string, detail: string): SCDLError {
		return new SCDLError(
			ErrorCodes.IncompatibleIdentification,
			"Incompatible vertex identifications in " + context + "(): " + detail,
		);
	}

	/**
	 * Identification collapsed two distinct vertices of the same simplex.
	 */
	static degenerateSimplex(
		context: string,
		simplex: readonly string[],
		canonical: readonly string[],
	): SCDLError {
		return new SCDLError(
			ErrorCodes.DegenerateSimplex,
			context +
				"(): simplex " +
				formatSimplex(simplex) +
				" collapsed to " +
				formatSimplex(canonical) +
				" after vertex identifications",
		);
	}

	static vertexNotFound(vertex: string, operand: "first" | "second"): SCDLError {
		return new SCDLError(
			ErrorCodes.VertexNotFound,
			"glue(): vertex '" + vertex + "' is not in the " + operand + " complex",
		);
	}

	static conflictingMapping(detail: string): SCDLError {
		return new SCDLError(ErrorCodes.ConflictingMapping, "glue(): " + detail);
	}

	static duplicateVertex(vertex: string): SCDLError {
		return new SCDLError(
			ErrorCodes.DuplicateVertex,
			"Duplicate vertex '" + vertex + "' in complex literal",
		);
	}

	static emptyComplex(): SCDLError {
		return new SCDLError(
			ErrorCodes.EmptyComplex,
			"Cannot pick a vertex from an empty complex",
		);
	}

	static simplexTooLarge(size: number, limit: number): SCDLError {
		return new SCDLError(
			ErrorCodes.SimplexTooLarge,
			"Cannot enumerate the faces of a simplex with " +
				String(size) +
				" vertices (limit " +
				String(limit) +
				")",
		);
	}

	static unboundIdentifier(name: string): SCDLError {
		return new SCDLError(
			ErrorCodes.UnboundIdentifier,
			"Unbound identifier: " + name,
		);
	}

	static notAValue(name: string): SCDLError {
		return new SCDLError(
			ErrorCodes.NotAValue,
			"Identifier '" + name + "' is not a value",
		);
	}

	static notAnOperator(name: string): SCDLError {
		return new SCDLError(
			ErrorCodes.NotAnOperator,
			"'" + name + "' is not an operator",
		);
	}

	static notAFunction(name: string): SCDLError {
		return new SCDLError(
			ErrorCodes.NotAFunction,
			"'" + name + "' is not a function",
		);
	}

	static notAVariable(name: string): SCDLError {
		return new SCDLError(
			ErrorCodes.NotAVariable,
			"Identifier '" + name + "' is not a complex variable",
		);
	}

	/**
	 * Create a TypeError
	 */
	static typeError(expected: string, got: string, context?: string): SCDLError {
		const ctx = context ? " (" + context + ")" : "";
		return new SCDLError(
			ErrorCodes.TypeError,
			"Type error" + ctx + ": expected " + expected + ", got " + got,
		);
	}

	/**
	 * Create an ArityError
	 */
	static arityError(expected: number | string, got: number, name: string): SCDLError {
		return new SCDLError(
			ErrorCodes.ArityError,
			"Arity error: " +
				name +
				" expects " +
				String(expected) +
				" arguments, got " +
				String(got),
		);
	}

	/**
	 * Result or literal outside the exactly representable integer range
	 */
	static integerOverflow(context: string, value: number): SCDLError {
		return new SCDLError(
			ErrorCodes.IntegerOverflow,
			"Integer overflow in " + context + ": " + String(value) + " is not a safe integer",
		);
	}

	static usage(message: string): SCDLError {
		return new SCDLError(ErrorCodes.UsageError, message);
	}

	static uninitializedAddress(addr: number): SCDLError {
		return new SCDLError(
			ErrorCodes.UninitializedAddress,
			"Address " + String(addr) + " not found in store",
		);
	}

	/**
	 * Create a NonTermination error
	 */
	static nonTermination(limit: number): SCDLError {
		return new SCDLError(
			ErrorCodes.NonTermination,
			"While loop exceeded " + String(limit) + " iterations, possible infinite loop",
		);
	}

	static recursionLimit(limit: number): SCDLError {
		return new SCDLError(
			ErrorCodes.NonTermination,
			"Function calls nested deeper than " + String(limit) + " levels",
		);
	}

	/**
	 * Create a ValidationError
	 */
	static validation(errors: readonly ValidationError[]): SCDLError {
		return new SCDLError(
			ErrorCodes.ValidationError,
			"Invalid program: " +
				errors.map((e) => e.path + ": " + e.message).join("; "),
		);
	}
}

function formatSimplex(simplex: readonly string[]): string {
	return "{" + simplex.join(", ") + "}";
}

//==============================================================================
// Validation Error Type
//==============================================================================

export interface ValidationError {
	path: string;
	message: string;
}

export type ValidationResult<T> =
	| { valid: true; errors: []; value: T }
	| { valid: false; errors: ValidationError[] };

/**
 * Create a successful validation result.
 */
export function validResult<T>(value: T): ValidationResult<T> {
	return { valid: true, errors: [], value };
}

/**
 * Create a failed validation result.
 */
export function invalidResult<T>(
	errors: ValidationError[],
): ValidationResult<T> {
	return { valid: false, errors };
}

//==============================================================================
// Exhaustiveness Checking
//==============================================================================

/**
 * Asserts that a value is `never`, ensuring exhaustive type checking.
 * Use in switch default cases to ensure all variants are handled.
 */
export function exhaustive(value: never): never {
	throw new Error(`Unexpected value: ${String(value)}`);
}
