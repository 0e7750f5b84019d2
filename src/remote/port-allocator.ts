import * as dgram from "node:dgram";
import { fail, ok, NoPortAvailableError, type Result } from "../errors.js";

export const PORT_RANGE_START = 6767;
export const PORT_RANGE_END = 6866;

/**
 * Probe a UDP port with an exclusive bind. The probe socket is closed before
 * the promise settles, whichever way the bind goes.
 */
export function isPortAvailable(port: number, address = "0.0.0.0"): Promise<boolean> {
  return new Promise((resolve) => {
    const sock = dgram.createSocket({ type: "udp4", reuseAddr: false });
    const finish = (available: boolean) => {
      try {
        sock.close(() => resolve(available));
      } catch {
        // close() throws when the socket never bound
        resolve(available);
      }
    };
    sock.once("error", () => finish(false));
    sock.bind({ port, address, exclusive: true }, () => finish(true));
  });
}

/**
 * First free port in `[start, end]`, ascending. Nothing is reserved: bind the
 * returned port promptly.
 */
export async function findAvailablePort(
  start: number = PORT_RANGE_START,
  end: number = PORT_RANGE_END,
  address?: string,
): Promise<Result<number, NoPortAvailableError>> {
  for (let port = start; port <= end; port++) {
    if (await isPortAvailable(port, address)) {
      console.error(`[UERemote] Found available multicast port: ${port}`);
      return ok(port);
    }
  }
  return fail(new NoPortAvailableError(start, end));
}
