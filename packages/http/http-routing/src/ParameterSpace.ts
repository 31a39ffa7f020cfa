const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * ParameterSpace - every parameter value known for a request, keyed by name.
 *
 * Values for a key keep insertion order and add() never overwrites, so
 * duplicate query or form fields all survive. Keys iterate in the order
 * they were first added.
 *
 * ```typescript
 * const params = new ParameterSpace();
 * params.add('tag', 'red');
 * params.add('tag', 'blue');
 * params.get('tag');    // 'red'
 * params.getAll('tag'); // ['red', 'blue']
 * ```
 */
export class ParameterSpace implements Iterable<[string, readonly string[]]> {
    private readonly values: Map<string, string[]> = new Map();

    /**
     * Append value to the sequence for key, creating it when absent.
     */
    add(key: string, value: string): void {
        const existing = this.values.get(key);
        if (existing) {
            existing.push(value);
        } else {
            this.values.set(key, [value]);
        }
    }

    /**
     * First value added for key, or '' when there is none.
     * Absent and empty look the same here; use has() to tell them apart.
     */
    get(key: string): string {
        const values = this.values.get(key);
        if (!values || values.length === 0) {
            return '';
        }
        return values[0];
    }

    /**
     * get(key) as a base-10 integer.
     * 0 when the key is absent, the value is not an integer or it is outside the safe integer range.
     */
    getInt(key: string): number {
        const value = this.get(key);
        if (!INTEGER_PATTERN.test(value)) {
            return 0;
        }

        const parsed = Number(value);
        return Number.isSafeInteger(parsed) ? parsed : 0;
    }

    /**
     * Every value for key in insertion order (a copy).
     */
    getAll(key: string): string[] {
        return [...(this.values.get(key) ?? [])];
    }

    has(key: string): boolean {
        return this.values.has(key);
    }

    keys(): string[] {
        return [...this.values.keys()];
    }

    /**
     * Number of distinct keys.
     */
    get size(): number {
        return this.values.size;
    }

    *[Symbol.iterator](): Iterator<[string, readonly string[]]> {
        for (const [key, values] of this.values) {
            yield [key, [...values]];
        }
    }
}
