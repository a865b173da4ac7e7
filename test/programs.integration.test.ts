// SCDL Programs - Integration Tests
// Whole documents through validation, evaluation and serialization

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { ErrorCodes } from "../src/errors.ts";
import { type RunResult, runProgram } from "../src/evaluator/program.ts";
import type { ComplexJSON } from "../src/types.ts";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function program(...commands: unknown[]): unknown {
	return { version: "1.0.0", commands };
}

const ident = (name: string) => ({ kind: "ident", name });
const lit = (...vertices: string[]) => ({ kind: "complexLit", vertices });
const num = (value: number) => ({ kind: "int", value });
const call = (op: string, ...args: unknown[]) => ({ kind: "opCall", op, args });
const declare = (name: string, expr: unknown) => ({ kind: "complexDecl", name, expr });
const assign = (name: string, expr: unknown) => ({ kind: "assign", name, expr });

function complexes(result: RunResult): Record<string, ComplexJSON> {
	if (!result.success) throw new Error("program failed: " + result.error);
	return result.complexes;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("runProgram", () => {
	it("reports every complex variable after a union", () => {
		const out = complexes(runProgram(program(
			declare("K", lit("a", "b", "c")),
			declare("L", lit("c", "d")),
			declare("U", call("union", ident("K"), ident("L"))),
		)));
		assert.deepEqual(Object.keys(out), ["K", "L", "U"]);
		assert.deepEqual(out["U"], {
			dimension: 2,
			simplices: [["a", "b", "c"], ["c", "d"]],
			vertices: ["a", "b", "c", "d"],
			classes: { a: ["a"], b: ["b"], c: ["c"], d: ["d"] },
		});
	});

	it("glues along a vertex mapping", () => {
		const out = complexes(runProgram(program(
			declare("K", lit("a", "b", "c")),
			declare("L", lit("d", "e")),
			declare("G", {
				kind: "opCall",
				op: "glue",
				args: [ident("K"), ident("L")],
				mapping: [{ from: "c", to: "d" }],
			}),
		)));
		assert.deepEqual(out["G"], {
			dimension: 2,
			simplices: [["a", "b", "c"], ["c", "e"]],
			vertices: ["a", "b", "c", "e"],
			classes: { a: ["a"], b: ["b"], c: ["c", "d"], e: ["e"] },
		});
	});

	it("reports a conflicting glue mapping", () => {
		const result = runProgram(program(
			declare("K", lit("a", "b")),
			declare("L", lit("d", "e")),
			declare("G", {
				kind: "opCall",
				op: "glue",
				args: [ident("K"), ident("L")],
				mapping: [{ from: "a", to: "d" }, { from: "b", to: "d" }],
			}),
		));
		assert.deepEqual(result, {
			success: false,
			error: "glue(): classes 'a' and 'b' are both mapped to 'd'",
			code: ErrorCodes.ConflictingMapping,
		});
	});

	it("branches on homology", () => {
		const out = complexes(runProgram(program(
			declare("H", call("union", lit("a", "b"), lit("b", "c"), lit("a", "c"))),
			declare("Flag", lit("z")),
			{
				kind: "if",
				cond: call("betti", ident("H"), num(1)),
				then: [assign("Flag", lit("y"))],
				else: [],
			},
		)));
		assert.deepEqual(out["Flag"]?.vertices, ["y"]);
	});

	it("combines observations in a condition", () => {
		const out = complexes(runProgram(program(
			declare("K", lit("a", "b", "c")),
			declare("R", lit("r")),
			{
				kind: "if",
				cond: call("and", call("greater", call("dim", ident("K")), num(1)), call("less", call("num_vert", ident("K")), num(4))),
				then: [assign("R", call("join", ident("R"), ident("K")))],
				else: [],
			},
		)));
		assert.equal(out["R"]?.dimension, 3);
	});

	it("builds a cone with a function", () => {
		const out = complexes(runProgram(program(
			{ kind: "vertexDecl", name: "apex" },
			{
				kind: "functionDecl",
				name: "cone",
				params: ["base"],
				body: call("join", ident("base"), ident("apex")),
			},
			declare("C", { kind: "funCall", name: "cone", args: [call("union", lit("a", "b"), lit("b", "c"))] }),
		)));
		assert.deepEqual(out["C"]?.simplices, [["a", "b", "__v0"], ["b", "c", "__v0"]]);
		assert.deepEqual(Object.keys(out), ["C"]);
	});

	it("reports an invalid document without evaluating it", () => {
		const result = runProgram({ version: "1.0.0", commands: [{ kind: "print" }] });
		assert.equal(result.success, false);
		if (result.success) return;
		assert.equal(result.code, ErrorCodes.ValidationError);
		assert.ok(result.error.startsWith("Invalid program: commands.0"), result.error);
	});

	it("honours the iteration limit", () => {
		const result = runProgram(
			program({ kind: "while", cond: num(1), body: [] }),
			{ maxIterations: 3 },
		);
		assert.deepEqual(result, {
			success: false,
			error: "While loop exceeded 3 iterations, possible infinite loop",
			code: ErrorCodes.NonTermination,
		});
	});

	it("reports unbound identifiers", () => {
		const result = runProgram(program(declare("K", ident("nowhere"))));
		assert.deepEqual(result, {
			success: false,
			error: "Unbound identifier: nowhere",
			code: ErrorCodes.UnboundIdentifier,
		});
	});
});
