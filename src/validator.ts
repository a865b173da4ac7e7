// SPDX-License-Identifier: MIT
// SCDL Program Validator
// Structural validation of parsed program documents. Name resolution, arity
// and operand kinds are left to evaluation.

import { z } from "zod/v4";
import {
	invalidResult,
	type ValidationError,
	type ValidationResult,
	validResult,
} from "./errors.ts";
import type { ComplexJSON, ProgramDocument } from "./types.ts";
import { ComplexJSONSchema, ProgramDocumentSchema } from "./zod-schemas.ts";

//==============================================================================
// Zod-to-ValidationError Conversion
//==============================================================================

function zodToValidationErrors(error: z.ZodError): ValidationError[] {
	return error.issues.map(issue => ({
		path: issue.path.map(String).join(".") || "$",
		message: issue.message,
	}));
}

//==============================================================================
// Public Validators
//==============================================================================

export function validateProgram(doc: unknown): ValidationResult<ProgramDocument> {
	const parsed = ProgramDocumentSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<ProgramDocument>(zodToValidationErrors(parsed.error));
	}
	return validResult<ProgramDocument>(parsed.data);
}

export function validateComplexJSON(doc: unknown): ValidationResult<ComplexJSON> {
	const parsed = ComplexJSONSchema.safeParse(doc);
	if (!parsed.success) {
		return invalidResult<ComplexJSON>(zodToValidationErrors(parsed.error));
	}
	return validResult<ComplexJSON>(parsed.data);
}
