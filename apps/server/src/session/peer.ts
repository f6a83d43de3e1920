/**
 * The session's view of its connection: one call to `send` is one frame,
 * `receive` resolves with the next frame or `null` once the peer is gone.
 * Transport failures reject with TransportError.
 */
export interface PeerConnection {
  send(frame: Buffer): Promise<void>
  receive(): Promise<Uint8Array | null>
  close(): void
}
