import os from "node:os";
import { MACAddress } from "./address/mac";
import { IPV4Address } from "./address/ipv4/ipv4";
import { IPV6Address } from "./address/ipv6/ipv6";
import { ArgumentError } from "./errors";

export type InterfaceAddress =
    | { family: "IPv4"; address: IPV4Address; netmask: IPV4Address }
    | { family: "IPv6"; address: IPV6Address; netmask: IPV6Address };

export type InterfaceInfo = {
    name: string;
    mac?: MACAddress;
    addresses: InterfaceAddress[];
    internal: boolean;
};

/** lists the network interfaces of the host */
export interface InterfaceLister {
    list(): InterfaceInfo[];
}

const NULL_MAC = "00:00:00:00:00:00";

/** interfaces as reported by `os.networkInterfaces` */
export const osInterfaceLister: InterfaceLister = {
    list() {
        let interfaces: InterfaceInfo[] = [];
        for (let [name, entries = []] of Object.entries(os.networkInterfaces())) {
            let info: InterfaceInfo = { name, addresses: [], internal: entries.some(e => e.internal) };
            for (let entry of entries) {
                if (!info.mac && entry.mac != NULL_MAC) {
                    info.mac = new MACAddress(entry.mac);
                }
                if (entry.family == "IPv4") {
                    info.addresses.push({ family: "IPv4", address: new IPV4Address(entry.address), netmask: new IPV4Address(entry.netmask) });
                } else {
                    // link local addresses carry a zone, eg. fe80::1%eth0
                    let address = entry.address.split("%")[0];
                    info.addresses.push({ family: "IPv6", address: new IPV6Address(address), netmask: new IPV6Address(entry.netmask) });
                }
            }
            interfaces.push(info);
        }
        return interfaces;
    },
};

/**
 * Addresses of a host interface, used as the default source addresses of
 * generated packets.
 *
 * @example
 * let config = new Config();
 * Packet.gen("IP", { saddr: config.ipaddr });
 */
export class Config {
    readonly iface: InterfaceInfo;

    /**
     * @param name interface to use, the first external interface with an IPv4 address when missing
     * @throws {ArgumentError} when the interface does not exist
     */
    constructor(name?: string, readonly lister: InterfaceLister = osInterfaceLister) {
        let interfaces = lister.list();
        let iface = name === undefined
            ? interfaces.find(i => !i.internal && i.addresses.some(a => a.family == "IPv4")) ?? interfaces[0]
            : interfaces.find(i => i.name == name);

        if (!iface) {
            throw new ArgumentError(name === undefined ? "no network interface found" : `unknown interface "${name}"`);
        }
        this.iface = iface;
    }

    get hwaddr(): MACAddress | undefined {
        return this.iface.mac;
    }

    get ipaddr(): IPV4Address | undefined {
        for (let a of this.iface.addresses) {
            if (a.family == "IPv4") return a.address;
        }
        return undefined;
    }

    get ip6addr(): IPV6Address | undefined {
        for (let a of this.iface.addresses) {
            if (a.family == "IPv6") return a.address;
        }
        return undefined;
    }

    /** directed broadcast address of the IPv4 network */
    get broadcast(): IPV4Address | undefined {
        for (let a of this.iface.addresses) {
            if (a.family != "IPv4") continue;
            return a.address.broadcast(a.netmask);
        }
        return undefined;
    }

    toObject(): Record<string, string | undefined> {
        return {
            iface: this.iface.name,
            hwaddr: this.hwaddr?.toString(),
            ipaddr: this.ipaddr?.toString(),
            ip6addr: this.ip6addr?.toString(),
        };
    }
}
