// SCDL Complex
// Immutable simplicial complex: maximal simplices plus vertex identifications

import { SCDLError } from "./errors.ts";
import { type ReadonlyUnionFind, UnionFind } from "./union-find.ts";

export type VertexName = string;

/** A non-empty set of vertices, kept in first-seen order. */
export type Simplex = readonly VertexName[];

/** Order-independent identity of a simplex. */
export function simplexKey(simplex: Simplex): string {
	return JSON.stringify([...simplex].sort());
}

/** Largest simplex whose faces are enumerated (2^20 - 1 faces). */
export const MAX_FACE_VERTICES = 20;

/**
 * Every non-empty subset of a simplex. Subsets containing the i-th vertex
 * follow all subsets of the first i vertices.
 */
export function faces(simplex: Simplex): Simplex[] {
	if (simplex.length > MAX_FACE_VERTICES) {
		throw SCDLError.simplexTooLarge(simplex.length, MAX_FACE_VERTICES);
	}
	const out: Simplex[] = [];
	for (const v of simplex) {
		const extended = out.map((face) => [...face, v]);
		out.push([v]);
		for (const face of extended) out.push(face);
	}
	return out;
}

export class Complex {
	readonly maximalSimplices: readonly Simplex[];
	readonly uf: ReadonlyUnionFind<VertexName>;

	constructor(simplices: Iterable<Simplex>, uf: ReadonlyUnionFind<VertexName>) {
		const unique = new Map<string, Simplex>();
		for (const s of simplices) {
			const key = simplexKey(s);
			if (!unique.has(key)) unique.set(key, Object.freeze([...s]));
		}
		this.maximalSimplices = Object.freeze([...unique.values()]);
		this.uf = uf;
	}

	static empty(): Complex {
		return new Complex([], new UnionFind<VertexName>());
	}

	static singleton(v: VertexName): Complex {
		return Complex.fromVertices([v]);
	}

	/**
	 * One maximal simplex over the listed vertices, each in its own class.
	 */
	static fromVertices(vertices: readonly VertexName[]): Complex {
		const uf = new UnionFind<VertexName>();
		for (const v of vertices) {
			if (uf.has(v)) throw SCDLError.duplicateVertex(v);
			uf.add(v);
		}
		return new Complex(vertices.length > 0 ? [vertices] : [], uf);
	}

	get dimension(): number {
		let dim = -1;
		for (const s of this.maximalSimplices) {
			dim = Math.max(dim, s.length - 1);
		}
		return dim;
	}

	get vertices(): VertexName[] {
		const verts = new Set<VertexName>();
		for (const s of this.maximalSimplices) {
			for (const v of s) verts.add(v);
		}
		return [...verts];
	}

	/** All faces of the complex, deduplicated. */
	get simplices(): Simplex[] {
		const all = new Map<string, Simplex>();
		for (const s of this.maximalSimplices) {
			for (const face of faces(s)) {
				const key = simplexKey(face);
				if (!all.has(key)) all.set(key, face);
			}
		}
		return [...all.values()];
	}

	/** Stable vertex enumeration, used to orient simplices in homology. */
	get vertexOrder(): Map<VertexName, number> {
		return new Map(this.vertices.map((v, i) => [v, i]));
	}

	get classes(): Map<VertexName, Set<VertexName>> {
		return this.uf.getClasses();
	}

	get numVertices(): number {
		return this.vertices.length;
	}

	get numSimplices(): number {
		return this.simplices.length;
	}

	hasVertex(v: VertexName): boolean {
		return this.maximalSimplices.some((s) => s.includes(v));
	}

	/** Whether v and w denote the same point in this complex. */
	identifies(v: VertexName, w: VertexName): boolean {
		return this.uf.equivalent(v, w);
	}

	toString(): string {
		const simplices = this.maximalSimplices
			.map((s) => "{" + s.join(", ") + "}")
			.join(", ");
		const classes = [...this.classes]
			.map(([rep, members]) => rep + ": [" + [...members].join(", ") + "]")
			.join(", ");
		return (
			"Complex(dimension=" +
			String(this.dimension) +
			", maximal_simplices=[" +
			simplices +
			"], classes={" +
			classes +
			"})"
		);
	}
}
