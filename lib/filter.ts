export type FilterValue = string | number | boolean;

export type FilterInput = Record<string, FilterValue | FilterValue[]>;

function render(value: FilterValue): string {
    if (typeof value === 'boolean') {
        return value ? 'true' : 'false';
    }
    return String(value);
}

/**
 * Filter collects the `filters` query parameter accepted by list endpoints.
 * The server expects a JSON object mapping each filter name to a list of strings,
 * e.g. `{"status":["running"],"label":["a=b","c"]}`.
 */
export class Filter {
    private data: Map<string, string[]> = new Map();

    static from(input: FilterInput): Filter {
        const filter = new Filter();
        for (const [key, value] of Object.entries(input)) {
            filter.set(key, Array.isArray(value) ? value : [value]);
        }
        return filter;
    }

    set(key: string, values: FilterValue[]): void {
        this.data.set(key, values.map(render));
    }

    add(key: string, value: FilterValue): void {
        const values = this.data.get(key);
        if (values) {
            values.push(render(value));
        } else {
            this.data.set(key, [render(value)]);
        }
    }

    get(key: string): string[] {
        const values = this.data.get(key);
        return values ? [...values] : [];
    }

    has(key: string): boolean {
        return this.data.has(key);
    }

    keys(): string[] {
        return Array.from(this.data.keys());
    }

    toJSON(): Record<string, string[]> {
        const result: Record<string, string[]> = {};
        for (const [key, values] of this.data) {
            result[key] = [...values];
        }
        return result;
    }

    toURLParameter(): string {
        return JSON.stringify(this.toJSON());
    }
}

// Shorthand for Filter.from(input).toURLParameter()
export function convertFilters(input: FilterInput): string {
    return Filter.from(input).toURLParameter();
}
