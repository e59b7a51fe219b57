/**
 * Dictionary table for string interning.
 *
 * Strings are stored once and referenced by uint32 index, so a string
 * column is a Uint32Array of indices plus one shared Dictionary.
 */

/** Represents the index of a string in the dictionary */
export type DictIndex = number;

export class Dictionary {
	private readonly strings: string[] = [];
	private readonly lookup = new Map<string, DictIndex>();

	/** Number of unique strings in the dictionary */
	get size(): number {
		return this.strings.length;
	}

	/**
	 * Intern a string.
	 * Returns the index if the string exists, or adds it and returns the new index.
	 */
	internString(str: string): DictIndex {
		const existing = this.lookup.get(str);
		if (existing !== undefined) {
			return existing;
		}
		const index = this.strings.length;
		this.strings.push(str);
		this.lookup.set(str, index);
		return index;
	}

	/** Look up a string's index without interning it */
	indexOf(str: string): DictIndex | undefined {
		return this.lookup.get(str);
	}

	/** Get the string stored at an index */
	getString(index: DictIndex): string | undefined {
		return this.strings[index];
	}
}

/** Create an empty dictionary */
export function createDictionary(): Dictionary {
	return new Dictionary();
}
