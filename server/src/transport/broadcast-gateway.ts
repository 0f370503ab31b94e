import type { Server, Socket } from 'socket.io';
import type { SessionState } from '../../../lib/contracts/game.js';
import { SERVER_TO_CLIENT_EVENTS } from '../../../lib/contracts/socket.js';
import type { StateBroadcaster } from '../domain/types.js';

export type BroadcastGateway = StateBroadcaster & {
  sendTo: (socket: Socket, state: SessionState) => void;
};

// One shared room: every viewer receives the same projection.
export const createBroadcastGateway = (io: Server): BroadcastGateway => ({
  broadcast: (state) => {
    io.emit(SERVER_TO_CLIENT_EVENTS.STATE, state);
  },
  sendTo: (socket, state) => {
    socket.emit(SERVER_TO_CLIENT_EVENTS.STATE, state);
  },
});
