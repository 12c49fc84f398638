// server.ts
import http from 'http';
import dotenv from 'dotenv';
import { Server } from 'socket.io';
import { loadConfig } from './config';
import { createApp } from './app';
import { makeServices } from './lib/services';
import { initSockets } from './realtime/sockets';

dotenv.config();

const config = loadConfig();
const io = new Server({ cors: { origin: config.corsOrigin } });
const services = makeServices(config, { notify: initSockets(io) });

const server = http.createServer(createApp(services));
io.attach(server);

server.listen(config.port, () => {
  console.log(`API on http://localhost:${config.port}`);
  console.log(`  Schedule: ${config.scheduleFile}`);
  console.log(`  Submissions: ${config.submissionsFile}`);
  console.log(`  Timezone: ${config.reveal.timezone} (${config.reveal.schedule.size} reveal dates)`);
});
