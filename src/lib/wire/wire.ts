import { PacketError, WireError } from "../errors";
import { ProtocolRegistry } from "../header/registry";
import { parseFrame } from "../packet/link-types";
import { Packet } from "../packet/packet";

export type Frame = {
    data: Uint8Array;
    timestamp: Date;
};

/** an open interface of the capture/inject driver */
export interface LiveInterface {
    readonly name: string;
    /** link type of the frames, see `LINK_TYPES` */
    readonly linkType: number;
    /** the next captured frame, `undefined` when the capture has ended */
    next(): Frame | undefined;
    write(data: Uint8Array): void;
    close(): void;
}

/** opens live interfaces, eg. on top of libpcap */
export interface WireDriver {
    open(name: string): LiveInterface;
}

export type CaptureOptions = {
    /** stop after this many matching frames */
    max?: number;
    /** keeps the frames it returns true for */
    filter?: (packet: Packet) => boolean;
    /** dissect frames into packets, true by default */
    parse?: boolean;
    registry?: ProtocolRegistry;
};

export type CapturedFrame = Frame & {
    packet?: Packet;
};

/** runs `action` against the driver, its failures are reported as `WireError` */
function delegate<R>(action: () => R): R {
    try {
        return action();
    } catch (error) {
        if (error instanceof WireError) throw error;
        let message = error instanceof Error ? error.message : String(error);
        throw new WireError(message, { cause: error });
    }
}

/**
 * Runs `action` and closes `iface` afterwards. When `action` failed, a failure to
 * close is only logged so that the first error is the one that propagates.
 */
function closing<R>(iface: LiveInterface, action: () => R): R {
    let result: R;
    try {
        result = action();
    } catch (error) {
        try {
            iface.close();
        } catch (closeError) {
            console.warn(`failed to close ${iface.name}: ${closeError instanceof Error ? closeError.message : String(closeError)}`);
        }
        throw error;
    }

    delegate(() => iface.close());
    return result;
}

/**
 * Reads frames from the interface `name` until the driver has no more or `max`
 * frames were kept. The interface is closed on every path out.
 */
export function capture(driver: WireDriver, name: string, options: CaptureOptions = {}): CapturedFrame[] {
    let { max = Infinity, filter, parse = true, registry } = options;
    let iface = delegate(() => driver.open(name));

    return closing(iface, () => {
        let frames: CapturedFrame[] = [];
        while (frames.length < max) {
            let frame = delegate(() => iface.next());
            if (!frame) break;

            if (!parse) {
                frames.push(frame);
                continue;
            }

            let packet: Packet;
            try {
                packet = parseFrame(frame.data, iface.linkType, registry);
            } catch (error) {
                if (!(error instanceof PacketError)) throw error;
                console.warn(`dropping a frame of ${frame.data.byteLength} bytes on ${name}: ${error.message}`);
                continue;
            }

            if (!filter || filter(packet)) {
                frames.push({ ...frame, packet });
            }
        }
        return frames;
    });
}

/** writes `data` to the interface `name` */
export function inject(driver: WireDriver, name: string, data: Uint8Array | Packet): void {
    let iface = delegate(() => driver.open(name));
    closing(iface, () => {
        let bytes = data instanceof Packet ? data.toBuffer() : data;
        delegate(() => iface.write(bytes));
    });
}
