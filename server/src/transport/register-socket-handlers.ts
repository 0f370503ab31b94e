import type { Server, Socket } from 'socket.io';
import { CLIENT_TO_SERVER_EVENTS } from '../../../lib/contracts/socket.js';
import type { SessionEngine } from '../domain/types.js';
import type { BroadcastGateway } from './broadcast-gateway.js';

export const registerSocketHandlers = (io: Server, engine: SessionEngine, gateway: BroadcastGateway) => {
  io.on('connection', (socket: Socket) => {
    gateway.sendTo(socket, engine.commandConnect(socket.id));

    socket.on(CLIENT_TO_SERVER_EVENTS.DRAW, () => {
      engine.commandDraw();
    });

    socket.on(CLIENT_TO_SERVER_EVENTS.REDRAW, (payload: unknown) => {
      engine.commandRedraw(payload);
    });

    socket.on(CLIENT_TO_SERVER_EVENTS.RESET, () => {
      engine.commandReset();
    });
  });
};
