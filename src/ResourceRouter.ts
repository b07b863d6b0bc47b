type PatternSegment =
	| { kind: "literal", value: string }
	| { kind: "param", name: string }
	| { kind: "wildcard" }
	;

// literal segments are more specific than parameters, which are more specific than the wildcard
const specificity: Record<PatternSegment["kind"], number> = {
	literal: 0,
	param: 1,
	wildcard: 2,
};

interface Route<T> {
	pattern: string;
	segments: PatternSegment[];
	value: T;
}

export interface RouteMatch<T> {
	value: T;
	/** The pattern that matched */
	pattern: string;
	/** Values of the `:name` segments */
	params: Record<string, string>;
	/** The path segments matched by a trailing `*` */
	rest: string[];
}

function parsePattern(pattern: string): PatternSegment[] {
	const trimmed = pattern.replace(/^\/+/, "");
	if (trimmed === "") return [];
	const parts = trimmed.split("/");
	return parts.map((part, i): PatternSegment => {
		if (part === "*") {
			if (i !== parts.length - 1) throw new Error(`invalid pattern ${pattern}: "*" must be the last segment`);
			return { kind: "wildcard" };
		}
		if (part.startsWith(":")) {
			const name = part.slice(1);
			if (name === "") throw new Error(`invalid pattern ${pattern}: parameter without a name`);
			return { kind: "param", name };
		}
		return { kind: "literal", value: part };
	});
}

function compareRoutes<T>(a: Route<T>, b: Route<T>): number {
	const length = Math.min(a.segments.length, b.segments.length);
	for (let i = 0; i < length; i++) {
		const diff = specificity[a.segments[i].kind] - specificity[b.segments[i].kind];
		if (diff !== 0) return diff;
	}
	return b.segments.length - a.segments.length;
}

/**
 * Maps Uri-Path segments to registered values.
 * Patterns consist of literal segments, `:name` parameters and an optional trailing `*`.
 */
export class ResourceRouter<T> {

	private routes: Route<T>[] = [];

	/** @throws Error if the pattern is invalid or already registered */
	public add(pattern: string, value: T): void {
		const segments = parsePattern(pattern);
		const key = normalize(segments);
		if (this.routes.some(r => normalize(r.segments) === key)) {
			throw new Error(`a resource is already registered for ${pattern}`);
		}
		this.routes.push({ pattern, segments, value });
		this.routes.sort(compareRoutes);
	}

	/** @returns whether a resource was registered for the pattern */
	public remove(pattern: string): boolean {
		const key = normalize(parsePattern(pattern));
		const index = this.routes.findIndex(r => normalize(r.segments) === key);
		if (index === -1) return false;
		this.routes.splice(index, 1);
		return true;
	}

	public get size(): number {
		return this.routes.length;
	}

	/** Finds the most specific route for the given path */
	public match(path: readonly string[]): RouteMatch<T> | undefined {
		for (const route of this.routes) {
			const ret = matchRoute(route, path);
			if (ret != undefined) return ret;
		}
	}
}

function normalize(segments: PatternSegment[]): string {
	return segments.map(s => {
		switch (s.kind) {
			case "literal": return `=${s.value}`;
			case "param": return ":";
			case "wildcard": return "*";
		}
	}).join("/");
}

function matchRoute<T>(route: Route<T>, path: readonly string[]): RouteMatch<T> | undefined {
	const params: Record<string, string> = {};
	for (let i = 0; i < route.segments.length; i++) {
		const segment = route.segments[i];
		if (segment.kind === "wildcard") {
			return { value: route.value, pattern: route.pattern, params, rest: path.slice(i) };
		}
		if (i >= path.length) return;
		if (segment.kind === "literal") {
			if (segment.value !== path[i]) return;
		} else {
			params[segment.name] = path[i];
		}
	}
	if (path.length !== route.segments.length) return;
	return { value: route.value, pattern: route.pattern, params, rest: [] };
}
