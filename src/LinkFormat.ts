import { LinkFormatError } from "./Errors";

/**
 * The parsed value of a link attribute. Attributes without a value are stored as `true`
 */
export type LinkParamValue = string | number | true | string[] | number[];

type AttributeKind =
	| "relation-types" // single token or a quoted, space-separated list
	| "quoted" // quoted-string only
	| "token-or-quoted"
	| "cardinal" // non-negative integer
	| "content-formats" // integer or a quoted, space-separated list of integers
	| "languages" // token, may appear multiple times
	| "flag" // no value
	;

interface AttributeRule {
	readonly kind: AttributeKind;
	/** Whether a second occurrence in the same link is an error */
	readonly once: boolean;
}

/**
 * Value grammar and multiplicity of the known link attributes
 */
const attributeRules: ReadonlyMap<string, AttributeRule> = new Map<string, AttributeRule>([
	["rel", { kind: "relation-types", once: true }],
	["rev", { kind: "relation-types", once: true }],
	["rt", { kind: "relation-types", once: true }],
	["if", { kind: "relation-types", once: true }],
	["anchor", { kind: "quoted", once: true }],
	["title", { kind: "quoted", once: true }],
	["type", { kind: "token-or-quoted", once: true }],
	["media", { kind: "token-or-quoted", once: true }],
	["hreflang", { kind: "languages", once: false }],
	["sz", { kind: "cardinal", once: true }],
	["ct", { kind: "content-formats", once: true }],
	["obs", { kind: "flag", once: false }],
]);

// characters that can appear within a ptoken
const PTOKEN_CHAR = /[!#$%&'()*+\-./0-9:<=>?@A-Za-z[\]^_`{|}~]/;
const PTOKEN = /^[!#$%&'()*+\-./0-9:<=>?@A-Za-z[\]^_`{|}~]+$/;
// characters that can appear within a parameter name
const PARMNAME_CHAR = /[A-Za-z0-9!#$&+\-.^_`|~*]/;
const WHITESPACE = /[ \t\r\n]/;

function isPtoken(value: string): boolean {
	return PTOKEN.test(value);
}

function isEntryIterable(
	params: Iterable<[string, LinkParamValue]> | Record<string, LinkParamValue>,
): params is Iterable<[string, LinkParamValue]> {
	return Symbol.iterator in params;
}

function quote(value: string): string {
	return `"${value.replace(/[\\"]/g, "\\$&")}"`;
}

/**
 * A single link-value: the target URI-reference and its attributes
 */
export class Link {

	public readonly params: ReadonlyMap<string, LinkParamValue>;

	constructor(
		public readonly uri: string,
		params: Iterable<[string, LinkParamValue]> | Record<string, LinkParamValue> = [],
	) {
		const entries = isEntryIterable(params) ? [...params] : Object.entries(params);
		this.params = new Map(entries.map(([name, value]): [string, LinkParamValue] => [name.toLowerCase(), value]));
	}

	public get(name: string): LinkParamValue | undefined {
		return this.params.get(name.toLowerCase());
	}
	public has(name: string): boolean {
		return this.params.has(name.toLowerCase());
	}

	/** Resource types (rt) */
	public get resourceTypes(): string[] {
		return this.getList("rt");
	}
	/** Interface descriptions (if) */
	public get interfaces(): string[] {
		return this.getList("if");
	}
	/** Content-Format codes (ct) */
	public get contentFormats(): number[] {
		const value = this.get("ct");
		if (typeof value === "number") return [value];
		if (Array.isArray(value)) return [...value].map(Number);
		return [];
	}
	/** Maximum size estimate (sz) */
	public get size(): number | undefined {
		const value = this.get("sz");
		return typeof value === "number" ? value : undefined;
	}
	public get title(): string | undefined {
		const value = this.get("title");
		return typeof value === "string" ? value : undefined;
	}
	public get observable(): boolean {
		return this.has("obs");
	}

	private getList(name: string): string[] {
		const value = this.get(name);
		if (typeof value === "string") return value.split(/ +/).filter(v => v.length > 0);
		if (Array.isArray(value)) return [...value].map(String);
		return [];
	}

	public toString(): string {
		const parts = [`<${this.uri}>`];
		for (const [name, value] of this.params) {
			parts.push(...renderParam(name, value));
		}
		return parts.join(";");
	}
}

function renderParam(name: string, value: LinkParamValue): string[] {
	if (value === true) return [name];
	const rule = attributeRules.get(name);
	if (Array.isArray(value)) {
		const items: (string | number)[] = [...value];
		if (rule != undefined && rule.kind === "languages") {
			return items.map(v => `${name}=${renderTokenOrQuoted(String(v))}`);
		}
		const joined = items.join(" ");
		return [`${name}=${items.length === 1 && isPtoken(joined) ? joined : quote(joined)}`];
	}
	if (typeof value === "number") return [`${name}=${value}`];
	if (rule != undefined && rule.kind === "quoted") return [`${name}=${quote(value)}`];
	return [`${name}=${renderTokenOrQuoted(value)}`];
}

function renderTokenOrQuoted(value: string): string {
	return isPtoken(value) ? value : quote(value);
}

/**
 * Renders links in the CoRE link format
 */
export function renderLinkFormat(links: Iterable<Link>): string {
	return [...links].map(l => l.toString()).join(",");
}

/**
 * Cursor over link-format text
 */
class LinkFormatReader {

	private pos: number = 0;

	constructor(private readonly text: string) {}

	public get atEnd(): boolean {
		return this.pos >= this.text.length;
	}

	private get current(): string {
		return this.text.charAt(this.pos);
	}

	public fail(message: string): never {
		throw new LinkFormatError(message, this.pos);
	}

	public skipWhitespace(): void {
		while (!this.atEnd && WHITESPACE.test(this.current)) this.pos++;
	}

	public expect(char: string): void {
		if (this.current !== char) {
			this.fail(this.atEnd ? `expected "${char}" but the text ended` : `expected "${char}" but found "${this.current}"`);
		}
		this.pos++;
	}

	private tryConsume(char: string): boolean {
		if (this.current !== char) return false;
		this.pos++;
		return true;
	}

	private readWhile(pattern: RegExp): string {
		const start = this.pos;
		while (!this.atEnd && pattern.test(this.current)) this.pos++;
		return this.text.slice(start, this.pos);
	}

	/** link-value = "<" URI-Reference ">" *( ";" link-param ) */
	public readLink(): Link {
		this.expect("<");
		const end = this.text.indexOf(">", this.pos);
		if (end === -1) this.fail("unterminated URI-reference");
		const uri = this.text.slice(this.pos, end);
		this.pos = end + 1;

		const params = new Map<string, LinkParamValue>();
		this.skipWhitespace();
		while (this.tryConsume(";")) {
			this.skipWhitespace();
			this.readParam(params);
			this.skipWhitespace();
		}
		return new Link(uri, params);
	}

	private readParam(params: Map<string, LinkParamValue>): void {
		const start = this.pos;
		const name = this.readWhile(PARMNAME_CHAR).toLowerCase();
		if (name.length === 0) this.fail("expected an attribute name");
		const rule = attributeRules.get(name);

		let value: LinkParamValue = true;
		if (this.tryConsume("=")) {
			if (rule != undefined && rule.kind === "flag") this.fail(`attribute ${name} does not take a value`);
			value = this.readValue(name, rule);
		} else if (rule != undefined && rule.kind !== "flag") {
			this.fail(`attribute ${name} requires a value`);
		}

		const existing = params.get(name);
		if (existing == undefined) {
			params.set(name, rule != undefined && rule.kind === "languages" && typeof value === "string" ? [value] : value);
		} else if (rule == undefined) {
			// the first occurrence of an unknown attribute wins
		} else if (rule.once) {
			throw new LinkFormatError(`attribute ${name} must not appear more than once`, start);
		} else if (rule.kind === "languages" && Array.isArray(existing) && typeof value === "string") {
			const prior: (string | number)[] = [...existing];
			params.set(name, [...prior.map(String), value]);
		}
	}

	private readValue(name: string, rule: AttributeRule | undefined): LinkParamValue {
		const kind = rule != undefined ? rule.kind : "token-or-quoted";
		switch (kind) {
			case "quoted":
				if (this.current !== "\"") this.fail(`attribute ${name} requires a quoted string`);
				return this.readQuoted();
			case "cardinal":
				return this.readCardinal(name);
			case "relation-types": {
				const list = this.current === "\"" ? this.readQuoted() : this.readPtoken(name);
				const ret = list.split(/[ \t]+/).filter(v => v.length > 0);
				if (ret.length === 0) this.fail(`attribute ${name} requires at least one value`);
				return ret;
			}
			case "content-formats": {
				if (this.current !== "\"") return [this.readCardinal(name)];
				const start = this.pos;
				const items = this.readQuoted().split(/[ \t]+/).filter(v => v.length > 0);
				if (items.length === 0 || items.some(v => !/^[0-9]+$/.test(v))) {
					throw new LinkFormatError(`attribute ${name} requires a list of integers`, start);
				}
				return items.map(v => parseInt(v, 10));
			}
			default:
				return this.current === "\"" ? this.readQuoted() : this.readPtoken(name);
		}
	}

	private readPtoken(name: string): string {
		const ret = this.readWhile(PTOKEN_CHAR);
		if (ret.length === 0) this.fail(`invalid value for attribute ${name}`);
		return ret;
	}

	private readCardinal(name: string): number {
		const digits = this.readWhile(/[0-9]/);
		if (digits.length === 0) this.fail(`attribute ${name} requires a non-negative integer`);
		return parseInt(digits, 10);
	}

	/** quoted-string, backslash escapes the following character */
	private readQuoted(): string {
		this.expect("\"");
		let ret = "";
		while (true) {
			if (this.atEnd) this.fail("unterminated quoted string");
			const char = this.current;
			this.pos++;
			if (char === "\"") return ret;
			if (char === "\\") {
				if (this.atEnd) this.fail("unterminated escape sequence");
				ret += this.current;
				this.pos++;
			} else {
				ret += char;
			}
		}
	}
}

/**
 * Parses a link-format document lazily. Each iteration parses one more link,
 * so errors in later links surface only when they are reached.
 * Iterating again requires parsing again.
 * @throws LinkFormatError
 */
export function* parseLinkFormat(text: string): IterableIterator<Link> {
	const reader = new LinkFormatReader(text);
	reader.skipWhitespace();
	if (reader.atEnd) return;
	while (true) {
		yield reader.readLink();
		reader.skipWhitespace();
		if (reader.atEnd) return;
		reader.expect(",");
		reader.skipWhitespace();
	}
}

/**
 * Parses a complete link-format document
 * @throws LinkFormatError
 */
export function parseLinks(text: string): Link[] {
	return [...parseLinkFormat(text)];
}
