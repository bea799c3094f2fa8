import { bytesToHex } from "@noble/hashes/utils";
import { InvalidStateError } from "./errors.ts";
import type { Reconciler } from "./reconciler/reconciler.ts";

export type ExchangeOptions = {
  /** How many replies the responder may send before the exchange is abandoned. */
  maxRounds?: number;
};

export type PeerIds = {
  haveIds: Uint8Array[];
  needIds: Uint8Array[];
};

export type ExchangeReport = {
  /** Number of replies sent by the responder. */
  rounds: number;
  /** Total bytes sent in both directions. */
  bytes: number;
  initiator: PeerIds;
  responder: PeerIds;
};

class IdCollector {
  private ids = new Map<string, Uint8Array>();

  add(ids: Uint8Array[]) {
    for (const id of ids) {
      this.ids.set(bytesToHex(id), id);
    }
  }

  values(): Uint8Array[] {
    return Array.from(this.ids.values());
  }
}

/** Execute a complete exchange between two Reconcilers in memory, collecting the ids each side learned. */
export function runExchange(
  initiator: Reconciler,
  responder: Reconciler,
  options: ExchangeOptions = {},
): ExchangeReport {
  const { maxRounds = 64 } = options;

  const initiatorHave = new IdCollector();
  const initiatorNeed = new IdCollector();
  const responderHave = new IdCollector();
  const responderNeed = new IdCollector();

  let message = initiator.initiate();
  let bytes = message.length;
  let rounds = 0;

  while (message.length > 0) {
    if (rounds >= maxRounds) {
      throw new InvalidStateError(
        `Exchange did not converge within ${maxRounds} rounds`,
      );
    }

    const reply = responder.reconcileWithIds(message);
    rounds++;
    bytes += reply.message.length;
    responderHave.add(reply.haveIds);
    responderNeed.add(reply.needIds);

    const next = initiator.reconcileWithIds(reply.message);
    bytes += next.message.length;
    initiatorHave.add(next.haveIds);
    initiatorNeed.add(next.needIds);

    message = next.message;
  }

  if (!responder.isConverged) {
    const last = responder.reconcileWithIds(message);
    responderHave.add(last.haveIds);
    responderNeed.add(last.needIds);
  }

  return {
    rounds,
    bytes,
    initiator: {
      haveIds: initiatorHave.values(),
      needIds: initiatorNeed.values(),
    },
    responder: {
      haveIds: responderHave.values(),
      needIds: responderNeed.values(),
    },
  };
}
