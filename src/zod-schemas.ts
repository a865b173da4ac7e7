// SCDL Zod Schemas
// Single source of truth for all document-serializable schemas.
// Runtime-only types (values, closures, operators) remain in types.ts.
//
// Type interfaces are defined manually (not via z.infer) because the
// expression and command grammars are recursive; recursive schemas are
// annotated with z.ZodType<ExplicitType>.

import { z } from "zod/v4";

//==============================================================================
// Primitives
//==============================================================================

/** Semantic version pattern */
const SemVer = z.string().regex(/^\d+\.\d+\.\d+(-[a-zA-Z0-9.]+)?$/);

const Identifier = z.string().min(1);

//==============================================================================
// Expression Domain - Manual Interfaces
//==============================================================================

export interface IdentExpr { kind: "ident"; name: string }
export interface ComplexLitExpr { kind: "complexLit"; vertices: string[] }
export interface IntLitExpr { kind: "int"; value: number }
export interface MappingPair { from: string; to: string }
export interface OpCallExpr { kind: "opCall"; op: string; args: Expr[]; mapping?: MappingPair[] | undefined }
export interface FunCallExpr { kind: "funCall"; name: string; args: Expr[] }

export type Expr = IdentExpr | ComplexLitExpr | IntLitExpr | OpCallExpr | FunCallExpr;

//==============================================================================
// Command Domain - Manual Interfaces
//==============================================================================

export interface ComplexDeclCmd { kind: "complexDecl"; name: string; expr: Expr }
export interface VertexDeclCmd { kind: "vertexDecl"; name: string }
export interface AssignCmd { kind: "assign"; name: string; expr: Expr }
export interface IfCmd { kind: "if"; cond: Expr; then: Command[]; else: Command[] }
export interface WhileCmd { kind: "while"; cond: Expr; body: Command[] }
export interface FunctionDeclCmd { kind: "functionDecl"; name: string; params: string[]; body: Expr }

export type Command = ComplexDeclCmd | VertexDeclCmd | AssignCmd | IfCmd | WhileCmd | FunctionDeclCmd;

export type Program = Command[];

export interface ProgramDocument {
	version: string;
	description?: string | undefined;
	commands: Program;
}

//==============================================================================
// Serialized Complex
//==============================================================================

export interface ComplexJSON {
	dimension: number;
	simplices: string[][];
	vertices: string[];
	classes: Record<string, string[]>;
}

//==============================================================================
// Zod Schemas - Expression Domain (5 variants)
//==============================================================================

export const IdentExprSchema = z.object({
	kind: z.literal("ident"),
	name: Identifier,
}).meta({ id: "IdentExpr", title: "Identifier", description: "Reference to a bound name" });

export const ComplexLitExprSchema = z.object({
	kind: z.literal("complexLit"),
	vertices: z.array(Identifier).min(1),
}).meta({ id: "ComplexLitExpr", title: "Complex Literal", description: "Single simplex over the listed vertices" });

export const IntLitExprSchema = z.object({
	kind: z.literal("int"),
	value: z.number().int().refine(Number.isSafeInteger, { message: "Integer literal is not a safe integer" }),
}).meta({ id: "IntLitExpr", title: "Integer Literal", description: "Integer constant" });

export const MappingPairSchema = z.object({
	from: Identifier,
	to: Identifier,
}).meta({ id: "MappingPair", title: "Mapping Pair", description: "Vertex of the first complex glued to a vertex of the second" });

export const OpCallExprSchema: z.ZodType<OpCallExpr> = z.object({
	kind: z.literal("opCall"),
	op: Identifier,
	get args() { return z.array(ExprSchema); },
	mapping: z.array(MappingPairSchema).optional(),
}).meta({ id: "OpCallExpr", title: "Operator Call", description: "Built-in operator application with optional glue mapping" });

export const FunCallExprSchema: z.ZodType<FunCallExpr> = z.object({
	kind: z.literal("funCall"),
	name: Identifier,
	get args() { return z.array(ExprSchema); },
}).meta({ id: "FunCallExpr", title: "Function Call", description: "User-defined function application" });

/** Union of all expression variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const ExprSchema: z.ZodType<Expr> = z.union([
	IdentExprSchema,
	ComplexLitExprSchema,
	IntLitExprSchema,
	OpCallExprSchema,
	FunCallExprSchema,
]).meta({ id: "Expr", title: "Expression", description: "Union of all SCDL expressions" });

//==============================================================================
// Zod Schemas - Command Domain (6 variants)
//==============================================================================

export const ComplexDeclCmdSchema = z.object({
	kind: z.literal("complexDecl"),
	name: Identifier,
	expr: ExprSchema,
}).meta({ id: "ComplexDeclCmd", title: "Complex Declaration", description: "Allocate a complex variable" });

export const VertexDeclCmdSchema = z.object({
	kind: z.literal("vertexDecl"),
	name: Identifier,
}).meta({ id: "VertexDeclCmd", title: "Vertex Declaration", description: "Bind a name to a fresh vertex" });

export const AssignCmdSchema = z.object({
	kind: z.literal("assign"),
	name: Identifier,
	expr: ExprSchema,
}).meta({ id: "AssignCmd", title: "Assignment", description: "Overwrite a complex variable" });

export const IfCmdSchema: z.ZodType<IfCmd> = z.object({
	kind: z.literal("if"),
	cond: ExprSchema,
	get then() { return z.array(CommandSchema); },
	get else() { return z.array(CommandSchema); },
}).meta({ id: "IfCmd", title: "Conditional", description: "Integer-guarded two-way branch" });

export const WhileCmdSchema: z.ZodType<WhileCmd> = z.object({
	kind: z.literal("while"),
	cond: ExprSchema,
	get body() { return z.array(CommandSchema); },
}).meta({ id: "WhileCmd", title: "While Loop", description: "Integer-guarded bounded loop" });

export const FunctionDeclCmdSchema = z.object({
	kind: z.literal("functionDecl"),
	name: Identifier,
	params: z.array(Identifier),
	body: ExprSchema,
}).meta({ id: "FunctionDeclCmd", title: "Function Declaration", description: "First-order function over expressions" });

export const CommandSchema: z.ZodType<Command> = z.union([
	ComplexDeclCmdSchema,
	VertexDeclCmdSchema,
	AssignCmdSchema,
	IfCmdSchema,
	WhileCmdSchema,
	FunctionDeclCmdSchema,
]).meta({ id: "Command", title: "Command", description: "Union of all SCDL commands" });

//==============================================================================
// Zod Schemas - Documents
//==============================================================================

export const ProgramDocumentSchema = z.object({
	version: SemVer,
	description: z.string().optional(),
	commands: z.array(CommandSchema),
}).meta({ id: "ProgramDocument", title: "SCDL Program", description: "Parsed SCDL program" });

export const ComplexJSONSchema = z.object({
	dimension: z.number().int().min(-1),
	simplices: z.array(z.array(z.string())),
	vertices: z.array(z.string()),
	classes: z.record(z.string(), z.array(z.string())),
}).meta({ id: "ComplexJSON", title: "Serialized Complex", description: "Complex as exposed to API and visualization layers" });
