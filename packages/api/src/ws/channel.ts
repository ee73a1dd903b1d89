import type { WebSocket } from 'ws';
import type { ClientChannel } from '../services/broadcast-hub.js';

/** ClientChannel over a `ws` socket; `send` resolves once ws has flushed the frame. */
export class WebSocketChannel implements ClientChannel {
  constructor(private readonly socket: WebSocket) {}

  send(frame: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.readyState !== this.socket.OPEN) {
        reject(new Error('WebSocket is not open'));
        return;
      }
      this.socket.send(frame, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  close(code = 1000, reason?: string): void {
    if (this.socket.readyState === this.socket.OPEN || this.socket.readyState === this.socket.CONNECTING) {
      this.socket.close(code, reason);
    }
  }
}
