/** A record held by a peer. Identity is the (timestamp, id) pair. */
export type Item = {
  timestamp: bigint;
  id: Uint8Array;
};

/** A marker in the sorted item space. The prefix compares as if padded with zero bytes. */
export type Bound = {
  timestamp: bigint;
  idPrefix: Uint8Array;
};

export type RangeMode = "skip" | "fingerprint" | "idList";

export type RangeDescriptor =
  | {
    mode: "skip";
    lowerBound: Bound;
    upperBound: Bound;
  }
  | {
    mode: "fingerprint";
    lowerBound: Bound;
    upperBound: Bound;
    fingerprint: Uint8Array;
  }
  | {
    mode: "idList";
    lowerBound: Bound;
    upperBound: Bound;
    ids: Uint8Array[];
  };

/** Ranges tiling the whole item space, or no ranges at all to signal termination. */
export type Message = RangeDescriptor[];

export type Role = "initiator" | "responder";

/** A half-open interval [lower, upper) of the item space. */
export type Interval = [Bound, Bound];

export type SessionState =
  | { status: "initial" }
  | {
    status: "awaitingPeer";
    role: "initiator";
    /** Intervals we sent as id lists in our last message. */
    outstanding: Interval[];
  }
  | {
    status: "responding";
    role: "responder";
    outstanding: Interval[];
  }
  | { status: "converged"; role: Role }
  | { status: "failed"; role: Role | null; error: Error };

export type SessionStatus = SessionState["status"];

export type ReconcileResult = {
  /** The reply to send to the peer. Empty once the exchange is over. */
  message: Uint8Array;
  /** Ids we hold that the peer lacks. */
  haveIds: Uint8Array[];
  /** Ids the peer holds that we lack. */
  needIds: Uint8Array[];
};
