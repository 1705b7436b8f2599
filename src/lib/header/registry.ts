import { ArgumentError, BindingError } from "../errors";
import { Binding, BindingFields, BindingOptions } from "./binding";
import type { AnyHeader, AnyHeaderType } from "./header";

/**
 * Protocol names, header types and the bindings between them.
 *
 * Everything is registered up front; the registry is sealed by the first packet
 * that uses it and rejects registrations from then on.
 */
export class ProtocolRegistry {
    private types = new Map<string, AnyHeaderType>();
    private bindings: Binding[] = [];
    private sealed = false;

    register(...types: AnyHeaderType[]): this {
        for (let type of types) {
            let known = this.types.get(type.protocolName);
            if (known === type) continue;

            this.assertOpen(`register ${type.protocolName}`);
            if (known) {
                throw new BindingError(`protocol ${type.protocolName} is already registered`);
            }
            this.types.set(type.protocolName, type);
        }
        return this;
    }

    /** @throws {ArgumentError} when no protocol is registered under `name` */
    get(name: string): AnyHeaderType {
        let type = this.types.get(name);
        if (!type) {
            throw new ArgumentError(`unknown protocol "${name}"`);
        }
        return type;
    }

    find(name: string): AnyHeaderType | undefined {
        return this.types.get(name);
    }

    all(): AnyHeaderType[] {
        return [...this.types.values()];
    }

    /**
     * Binds `to` as a successor of `from`, both are registered when they are not yet.
     * @example registry.bind(IPV6, UDP, { nextHeader: 17 })
     * @throws {BindingError} when another successor of `from` could match the same header
     */
    bind(from: AnyHeaderType, to: AnyHeaderType, fields: BindingFields = {}, options: BindingOptions = {}): this {
        this.assertOpen(`bind ${from.protocolName} to ${to.protocolName}`);
        this.register(from, to);

        let binding = new Binding(from, to, fields, options);
        for (let other of this.bindingsFrom(from)) {
            if (other.to !== to && other.overlaps(binding)) {
                throw new BindingError(
                    `ambiguous binding: "${binding.describe()}" overlaps "${other.describe()}"`,
                    from.protocolName, to.protocolName
                );
            }
        }

        this.bindings.push(binding);
        return this;
    }

    bindingsFrom(from: AnyHeaderType): Binding[] {
        return this.bindings.filter(b => b.from === from);
    }

    bindingsBetween(from: AnyHeaderType, to: AnyHeaderType): Binding[] {
        return this.bindings.filter(b => b.from === from && b.to === to);
    }

    /** bindings from the type of `header` that hold on its fields and body */
    successorsOf(header: AnyHeader): Binding[] {
        return this.bindingsFrom(header.definition).filter(b => b.matches(header));
    }

    seal(): this {
        this.sealed = true;
        return this;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    private assertOpen(action: string): void {
        if (this.sealed) {
            throw new BindingError(`cannot ${action}; the registry is in use and sealed`);
        }
    }
}
