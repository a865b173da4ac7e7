// SCDL Homology
// Simplicial homology over GF(2): boundary matrices, rank, Betti numbers

import { type Complex, type Simplex, type VertexName, simplexKey } from "./complex.ts";

/** Dense GF(2) matrix, one byte per entry. */
export type Gf2Matrix = Uint8Array[];

//==============================================================================
// Skeleta
//==============================================================================

/** Faces of the complex bucketed by dimension. */
export function skeletonMap(complex: Complex): Map<number, Simplex[]> {
	const skeleton = new Map<number, Simplex[]>();
	for (const s of complex.simplices) {
		const dim = s.length - 1;
		let bucket = skeleton.get(dim);
		if (!bucket) {
			bucket = [];
			skeleton.set(dim, bucket);
		}
		bucket.push(s);
	}
	return skeleton;
}

export function kSimplices(complex: Complex, k: number): Simplex[] {
	return skeletonMap(complex).get(k) ?? [];
}

/** Vertices of a simplex sorted by the complex's vertex order. */
export function orderedSimplex(
	simplex: Simplex,
	order: ReadonlyMap<VertexName, number>,
): VertexName[] {
	const rank = (v: VertexName): number => order.get(v) ?? Number.MAX_SAFE_INTEGER;
	return [...simplex].sort((a, b) => rank(a) - rank(b) || (a < b ? -1 : a > b ? 1 : 0));
}

//==============================================================================
// Boundary matrix
//==============================================================================

/**
 * ∂_k : C_k → C_{k-1}. Rows are (k-1)-faces, columns are k-faces.
 */
export function boundaryMatrix(complex: Complex, k: number): Gf2Matrix {
	const skeleton = skeletonMap(complex);
	return buildBoundary(skeleton.get(k) ?? [], skeleton.get(k - 1) ?? [], complex.vertexOrder);
}

function buildBoundary(
	kSimp: readonly Simplex[],
	lowerSimp: readonly Simplex[],
	order: ReadonlyMap<VertexName, number>,
): Gf2Matrix {
	const rowIndex = new Map(lowerSimp.map((s, i) => [simplexKey(s), i]));
	const matrix: Gf2Matrix = lowerSimp.map(() => new Uint8Array(kSimp.length));

	kSimp.forEach((simplex, col) => {
		const verts = orderedSimplex(simplex, order);
		for (let i = 0; i < verts.length; i++) {
			const face = [...verts.slice(0, i), ...verts.slice(i + 1)];
			const row = rowIndex.get(simplexKey(face));
			const line = row === undefined ? undefined : matrix[row];
			if (line) line[col] = (line[col] ?? 0) ^ 1;
		}
	});
	return matrix;
}

//==============================================================================
// Rank over GF(2)
//==============================================================================

/** Rank by forward elimination with row swaps. The input is not modified. */
export function rankMod2(input: Gf2Matrix): number {
	const m = input.map((row) => row.map((x) => x & 1));
	const rows = m.length;
	const cols = m[0]?.length ?? 0;
	let rank = 0;

	for (let col = 0; col < cols && rank < rows; col++) {
		let pivot = -1;
		for (let r = rank; r < rows; r++) {
			if (m[r]?.[col] === 1) {
				pivot = r;
				break;
			}
		}
		if (pivot < 0) continue;

		const pivotRow = m[pivot];
		const rankRow = m[rank];
		if (!pivotRow || !rankRow) continue;
		m[pivot] = rankRow;
		m[rank] = pivotRow;

		for (let r = rank + 1; r < rows; r++) {
			const row = m[r];
			if (row?.[col] === 1) {
				for (let c = col; c < cols; c++) {
					row[c] = (row[c] ?? 0) ^ (pivotRow[c] ?? 0);
				}
			}
		}
		rank++;
	}
	return rank;
}

//==============================================================================
// Betti numbers
//==============================================================================

function boundaryRank(
	skeleton: Map<number, Simplex[]>,
	k: number,
	dimension: number,
	order: ReadonlyMap<VertexName, number>,
): number {
	if (k <= 0 || k > dimension) return 0;
	return rankMod2(buildBoundary(skeleton.get(k) ?? [], skeleton.get(k - 1) ?? [], order));
}

/**
 * β_k = (#k-faces − rank ∂_k) − rank ∂_{k+1}; 0 outside [0, dim].
 */
export function bettiNumber(complex: Complex, k: number): number {
	const dim = complex.dimension;
	if (k < 0 || k > dim) return 0;
	const skeleton = skeletonMap(complex);
	const order = complex.vertexOrder;
	const chains = skeleton.get(k)?.length ?? 0;
	return chains - boundaryRank(skeleton, k, dim, order) - boundaryRank(skeleton, k + 1, dim, order);
}

/** Betti numbers for every degree 0..dim. */
export function computeHomology(complex: Complex): Map<number, number> {
	const homology = new Map<number, number>();
	for (let k = 0; k <= complex.dimension; k++) {
		homology.set(k, bettiNumber(complex, k));
	}
	return homology;
}

/** Alternating count of faces by dimension. */
export function eulerCharacteristic(complex: Complex): number {
	let chi = 0;
	for (const [dim, simplices] of skeletonMap(complex)) {
		chi += (dim % 2 === 0 ? 1 : -1) * simplices.length;
	}
	return chi;
}
