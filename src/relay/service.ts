/**
 * Relay Module - Service Layer
 *
 * Forwards every input line verbatim over UDP. Datagrams are fire and
 * forget: a failed send is reported to the caller and never retried.
 */
import { createSocket } from "node:dgram";

import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { RelayError } from "./errors.js";
import { sendFailed } from "./errors.js";
import type { LineRelay, RelayDestination } from "./schema.js";

const log = createLogger("relay");

/**
 * Open a UDP socket relaying lines to a fixed destination.
 *
 * @param destination - Host and port of the observer
 * @returns Relay whose send resolves once the datagram is handed to the OS
 */
export function createUdpRelay(destination: RelayDestination): LineRelay {
  const socket = createSocket("udp4");

  socket.on("error", (error) => {
    log.error({ error: error.message }, "UDP relay socket error");
  });

  log.info(
    { host: destination.host, port: destination.port },
    "UDP relay ready",
  );

  return {
    send(line) {
      return new Promise<Result<void, RelayError>>((resolve) => {
        socket.send(
          Buffer.from(line, "utf-8"),
          destination.port,
          destination.host,
          (error) => {
            if (error) {
              resolve(err(sendFailed(error.message, error)));
            } else {
              resolve(ok(undefined));
            }
          },
        );
      });
    },

    close() {
      return new Promise<void>((resolve) => {
        socket.close(() => resolve());
      });
    },
  };
}
