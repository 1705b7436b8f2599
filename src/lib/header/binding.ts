import { ArgumentError } from "../errors";
import type { AnyHeader, AnyHeaderType } from "./header";

export type Range = { min?: number; max?: number };

/** exact value, any of a list of values or an inclusive range */
export type FieldCondition = number | readonly number[] | Range;

export type BindingFields = Readonly<Record<string, FieldCondition>>;

export type BindingOptions = {
    /** inclusive range of the predecessor's body length, ie. the size of the successor */
    bodyLength?: Range;
};

type Condition = {
    values?: readonly number[];
    min: number;
    max: number;
};

function normalize(key: string, condition: FieldCondition): Condition {
    if (typeof condition == "number") {
        return { values: [condition], min: condition, max: condition };
    }
    if (isList(condition)) {
        if (!condition.length) {
            throw new ArgumentError(`empty value list for "${key}"`);
        }
        return { values: condition, min: Math.min(...condition), max: Math.max(...condition) };
    }
    return { min: condition.min ?? -Infinity, max: condition.max ?? Infinity };
}

function isList(condition: readonly number[] | Range): condition is readonly number[] {
    return Array.isArray(condition);
}

function holds(condition: Condition, value: number): boolean {
    if (condition.values) return condition.values.includes(value);
    return value >= condition.min && value <= condition.max;
}

function intersects(a: Condition, b: Condition): boolean {
    if (a.values) return a.values.some(v => holds(b, v));
    if (b.values) return b.values.some(v => holds(a, v));
    return Math.max(a.min, b.min) <= Math.min(a.max, b.max);
}

function describeCondition(key: string, condition: Condition): string {
    if (condition.values) {
        return condition.values.length == 1 ? `${key} == ${condition.values[0]}` : `${key} in [${condition.values.join(", ")}]`;
    }
    if (condition.min == -Infinity) return `${key} <= ${condition.max}`;
    if (condition.max == Infinity) return `${key} >= ${condition.min}`;
    return `${condition.min} <= ${key} <= ${condition.max}`;
}

/**
 * A directed edge of the protocol graph: `to` follows `from` when every field
 * condition holds on the `from` header and its body length is within `bodyLength`.
 */
export class Binding {
    private readonly conditions: ReadonlyMap<string, Condition>;
    private readonly bodyLength: Condition;

    constructor(readonly from: AnyHeaderType, readonly to: AnyHeaderType, fields: BindingFields, options: BindingOptions = {}) {
        let conditions = new Map<string, Condition>();
        for (let [key, condition] of Object.entries(fields)) {
            if (!from.isKey(key) || key == "body") {
                throw new ArgumentError(`${from.protocolName} has no field "${key}" to bind on`);
            }
            conditions.set(key, normalize(key, condition));
        }

        this.conditions = conditions;
        this.bodyLength = normalize("bodyLength", options.bodyLength ?? {});
    }

    get fields(): string[] {
        return [...this.conditions.keys()];
    }

    /** the conditions hold on `header` and its current body */
    matches(header: AnyHeader): boolean {
        return this.acceptsFields(header, () => true) && this.acceptsBodyLength(header.body.byteLength);
    }

    /** the fields of `header` that were set explicitly satisfy the conditions */
    acceptsAssigned(header: AnyHeader): boolean {
        return this.acceptsFields(header, key => header.isAssigned(key));
    }

    acceptsBodyLength(length: number): boolean {
        return holds(this.bodyLength, length);
    }

    private acceptsFields(header: AnyHeader, check: (key: string) => boolean): boolean {
        for (let [key, condition] of this.conditions) {
            if (check(key) && !holds(condition, header.numeric(key))) return false;
        }
        return true;
    }

    /**
     * Values that satisfy every condition: the value itself, the first of a list,
     * the lower bound of a range (or the upper bound when it has none, or zero).
     */
    defaults(): Record<string, number> {
        let values: Record<string, number> = {};
        for (let [key, condition] of this.conditions) {
            if (condition.values) {
                values[key] = condition.values[0];
            } else if (condition.min != -Infinity) {
                values[key] = condition.min;
            } else if (condition.max != Infinity) {
                values[key] = Math.min(condition.max, 0);
            } else {
                values[key] = 0;
            }
        }
        return values;
    }

    /**
     * Both bindings can hold on the same header: every field they both constrain
     * has a common value and their body length ranges intersect.
     */
    overlaps(other: Binding): boolean {
        for (let [key, condition] of this.conditions) {
            let otherCondition = other.conditions.get(key);
            if (otherCondition && !intersects(condition, otherCondition)) return false;
        }
        return intersects(this.bodyLength, other.bodyLength);
    }

    describe(): string {
        let parts = [...this.conditions].map(([key, condition]) => describeCondition(key, condition));
        if (this.bodyLength.min != -Infinity || this.bodyLength.max != Infinity) {
            parts.push(describeCondition("bodyLength", this.bodyLength));
        }
        return `${this.from.protocolName} -> ${this.to.protocolName}` + (parts.length ? ` when ${parts.join(", ")}` : "");
    }
}
