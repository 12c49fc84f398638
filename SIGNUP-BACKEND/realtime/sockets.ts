// realtime/sockets.ts
import { Server } from 'socket.io';
import { Notifier, SubmissionsChanged } from '../lib/services';

// Viewers hold no state of their own: a change tells them to refetch.
export function initSockets(io: Server): Notifier {
  io.on('connection', (socket) => {
    console.log(`[socket] connected ${socket.id}`);
    socket.on('disconnect', () => console.log(`[socket] disconnected ${socket.id}`));
  });

  return (event: SubmissionsChanged) => {
    io.emit('submissions_changed', event);
  };
}
