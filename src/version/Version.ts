import { type VersionFields, VersionStage } from "../@types/version";
import { VersionParseError } from "../errors";

const STAGE_NAMES = new Map<string, VersionStage>([
	["alpha", VersionStage.ALPHA],
	["beta", VersionStage.BETA],
	["release", VersionStage.RELEASE],
]);

const DIGITS = /^\d+$/;

/**
 * Build identifier of the game: `major.minor.patch[-stage][.build]`.
 *
 * Versions are immutable and totally ordered by
 * `(major, minor, patch, stage, build)` with alpha < beta < release, so a
 * plain release sorts above every pre-release of the same triple.
 */
export class Version {
	readonly major: number;
	readonly minor: number;
	readonly patch: number;
	readonly stage: VersionStage;
	readonly build: number;

	private constructor(fields: VersionFields) {
		this.major = fields.major;
		this.minor = fields.minor;
		this.patch = fields.patch;
		this.stage = fields.stage ?? VersionStage.RELEASE;
		this.build = fields.build ?? 0;
		Object.freeze(this);
	}

	/**
	 * Create a version from its fields.
	 *
	 * @throws RangeError when a numeric field is not a non-negative integer
	 */
	static from(fields: VersionFields): Version {
		for (const [name, value] of Object.entries({
			major: fields.major,
			minor: fields.minor,
			patch: fields.patch,
			build: fields.build ?? 0,
		})) {
			if (!Number.isSafeInteger(value) || value < 0) {
				throw new RangeError(
					`Version ${name} must be a non-negative integer, got ${value}`,
				);
			}
		}

		return new Version(fields);
	}

	/**
	 * Parse user input such as `0.3.0-alpha.1` or `v1.2.0`.
	 *
	 * Whitespace and leading `v` characters are ignored. Tokens after the
	 * build number are ignored as well.
	 *
	 * @throws VersionParseError naming the offending field
	 */
	static parse(input: string): Version {
		const source = input.trim().replace(/^v+/, "");
		if (source.length === 0) {
			throw new VersionParseError(
				"Version string cannot be empty",
				"version",
				input,
			);
		}

		const dash = source.indexOf("-");
		const corePart = dash === -1 ? source : source.slice(0, dash);
		const stagePart = dash === -1 ? null : source.slice(dash + 1);

		const numbers = corePart.split(".");
		if (numbers.length !== 3) {
			throw new VersionParseError(
				"Version must be in the format major.minor.patch",
				"core",
				input,
			);
		}

		const [majorText = "", minorText = "", patchText = ""] = numbers;
		const major = parseNumber(majorText, "major", input);
		const minor = parseNumber(minorText, "minor", input);
		const patch = parseNumber(patchText, "patch", input);

		if (stagePart === null) {
			return new Version({ major, minor, patch });
		}

		const [stageName = "", buildText] = stagePart.split(".");
		const stage = STAGE_NAMES.get(stageName);
		if (stage === undefined) {
			throw new VersionParseError("Invalid version stage", "stage", input);
		}

		const build =
			buildText === undefined ? 0 : parseNumber(buildText, "build", input);

		return new Version({ major, minor, patch, stage, build });
	}

	/**
	 * Like `parse`, but returns null instead of throwing
	 */
	static tryParse(input: string): Version | null {
		try {
			return Version.parse(input);
		} catch (error) {
			if (error instanceof VersionParseError) {
				return null;
			}
			throw error;
		}
	}

	/**
	 * Negative when `a` sorts before `b`, positive when after, zero when equal
	 */
	static compare(a: Version, b: Version): number {
		return (
			a.major - b.major ||
			a.minor - b.minor ||
			a.patch - b.patch ||
			a.stage - b.stage ||
			a.build - b.build
		);
	}

	/**
	 * New array with the most recent version first
	 */
	static sortDescending(versions: Iterable<Version>): Version[] {
		return [...versions].sort((a, b) => Version.compare(b, a));
	}

	get isPrerelease(): boolean {
		return this.stage !== VersionStage.RELEASE;
	}

	/**
	 * Canonical string, usable as a map key: two versions share a key iff
	 * they are equal
	 */
	get key(): string {
		return this.toString();
	}

	/**
	 * Release tag on the release host
	 */
	get tag(): string {
		return `v${this.toString()}`;
	}

	equals(other: Version): boolean {
		return Version.compare(this, other) === 0;
	}

	toString(): string {
		let rendered = `${this.major}.${this.minor}.${this.patch}`;

		if (this.stage === VersionStage.ALPHA) {
			rendered += "-alpha";
		} else if (this.stage === VersionStage.BETA) {
			rendered += "-beta";
		}

		if (this.build > 0) {
			if (this.stage === VersionStage.RELEASE) {
				rendered += "-release";
			}
			rendered += `.${this.build}`;
		}

		return rendered;
	}

	toJSON(): string {
		return this.toString();
	}
}

function parseNumber(
	text: string,
	field: "major" | "minor" | "patch" | "build",
	input: string,
): number {
	const value = Number(text);
	if (!DIGITS.test(text) || !Number.isSafeInteger(value)) {
		throw new VersionParseError(
			field === "build" ? "Invalid build number" : `Invalid ${field} version`,
			field,
			input,
		);
	}

	return value;
}
