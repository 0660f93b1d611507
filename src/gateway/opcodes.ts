export enum OpCode {
  DISPATCH = 0,
  HEARTBEAT = 1,
  IDENTIFY = 2,
  PRESENCE_UPDATE = 3,
  RESUME = 6,
  RECONNECT = 7,
  REQUEST_GUILD_MEMBERS = 8,
  INVALID_SESSION = 9,
  HELLO = 10,
  HEARTBEAT_ACK = 11
}

/** Codes the client itself closes the socket with. */
export enum LocalCloseCode {
  NORMAL = 1000,
  /** Server asked for a reconnect; the session is kept for a resume. */
  RECONNECT = 4900,
  /** No heartbeat ack arrived in time. */
  STALE_CONNECTION = 4901,
  /** Server invalidated the session; the next handshake identifies. */
  INVALID_SESSION = 4902
}
