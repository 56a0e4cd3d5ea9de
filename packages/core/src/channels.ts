/**
 * Transport variants a channel can sit on
 *
 * @module channels
 */

import type { Socket } from "node:net";
import type { SecureContext } from "node:tls";
import { TLSSocket } from "node:tls";

export type Transport = { readonly kind: "plain"; readonly socket: Socket } | { readonly kind: "secure"; readonly socket: TLSSocket };

export type TransportKind = Transport["kind"];

/**
 * Wrap an accepted socket in the transport the server is configured for.
 *
 * - No secure context: the socket is used as is
 * - Secure context: the socket is wrapped in a server-side TLSSocket
 *
 * @param socket - Socket handed out by the listener
 * @param secureContext - Server TLS context, null for plaintext
 */
export function createTransport(socket: Socket, secureContext: SecureContext | null): Transport {
    if (!secureContext) {
        return { kind: "plain", socket };
    }
    return { kind: "secure", socket: new TLSSocket(socket, { isServer: true, secureContext }) };
}
