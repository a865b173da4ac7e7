// SCDL Union-Find
// Disjoint-set forest over vertex names with union by rank and path compression

/** Queries that leave the equivalence relation unchanged. */
export interface ReadonlyUnionFind<T> {
	readonly size: number;
	has(x: T): boolean;
	nodes(): T[];
	find(x: T): T;
	equivalent(x: T, y: T): boolean;
	getClasses(): Map<T, Set<T>>;
	classOf(x: T): Set<T>;
	merge(other: ReadonlyUnionFind<T>): UnionFind<T>;
	clone(): UnionFind<T>;
}

export class UnionFind<T> implements ReadonlyUnionFind<T> {
	private readonly parent = new Map<T, T>();
	private readonly rank = new Map<T, number>();

	get size(): number {
		return this.parent.size;
	}

	/** Insert a singleton class; no-op when the node is already known. */
	add(x: T): void {
		if (!this.parent.has(x)) {
			this.parent.set(x, x);
			this.rank.set(x, 0);
		}
	}

	has(x: T): boolean {
		return this.parent.has(x);
	}

	/** Nodes in insertion order. */
	nodes(): T[] {
		return [...this.parent.keys()];
	}

	/**
	 * Canonical representative of x's class. Unknown nodes are added first.
	 */
	find(x: T): T {
		this.add(x);
		let root = x;
		for (let next = this.parentOf(root); next !== root; next = this.parentOf(root)) {
			root = next;
		}
		let node = x;
		while (node !== root) {
			const next = this.parentOf(node);
			this.parent.set(node, root);
			node = next;
		}
		return root;
	}

	/**
	 * Merge the classes of x and y and return the new representative.
	 * On equal ranks the root of x wins.
	 */
	union(x: T, y: T): T {
		const rx = this.find(x);
		const ry = this.find(y);
		if (rx === ry) return rx;

		const rankX = this.rankOf(rx);
		const rankY = this.rankOf(ry);
		if (rankX < rankY) {
			this.parent.set(rx, ry);
			return ry;
		}
		this.parent.set(ry, rx);
		if (rankX === rankY) this.rank.set(rx, rankX + 1);
		return rx;
	}

	/** Equivalence test that never inserts: unknown nodes are only equal to themselves. */
	equivalent(x: T, y: T): boolean {
		if (x === y) return true;
		if (!this.has(x) || !this.has(y)) return false;
		return this.find(x) === this.find(y);
	}

	/** Representative → members, in insertion order. */
	getClasses(): Map<T, Set<T>> {
		const out = new Map<T, Set<T>>();
		for (const x of this.parent.keys()) {
			const rep = this.find(x);
			let members = out.get(rep);
			if (!members) {
				members = new Set<T>();
				out.set(rep, members);
			}
			members.add(x);
		}
		return out;
	}

	/** Members of x's class (x alone when unknown). */
	classOf(x: T): Set<T> {
		if (!this.has(x)) return new Set([x]);
		const rep = this.find(x);
		const members = new Set<T>();
		for (const y of this.parent.keys()) {
			if (this.find(y) === rep) members.add(y);
		}
		return members;
	}

	/**
	 * New structure over the nodes of both inputs whose relation is the
	 * transitive closure of both relations. The relations of the inputs are
	 * left unchanged.
	 */
	merge(other: ReadonlyUnionFind<T>): UnionFind<T> {
		const merged = new UnionFind<T>();
		for (const x of this.parent.keys()) merged.add(x);
		for (const x of other.nodes()) merged.add(x);
		merged.absorb(this);
		merged.absorb(other);
		return merged;
	}

	clone(): UnionFind<T> {
		const copy = new UnionFind<T>();
		copy.absorb(this);
		return copy;
	}

	private absorb(source: ReadonlyUnionFind<T>): void {
		for (const x of source.nodes()) {
			this.union(source.find(x), x);
		}
	}

	private parentOf(x: T): T {
		const p = this.parent.get(x);
		if (p === undefined) {
			throw new Error("UnionFind: missing parent entry");
		}
		return p;
	}

	private rankOf(x: T): number {
		return this.rank.get(x) ?? 0;
	}
}
