import express from 'express';
import { createServer } from 'http';
import { Server, Socket } from 'socket.io';
import cors from 'cors';
import { GameRoom } from './rooms/GameRoom';

const PORT = process.env.PORT ? parseInt(process.env.PORT) : 4000;
const TICK_INTERVAL_MS = process.env.TICK_INTERVAL_MS ? parseInt(process.env.TICK_INTERVAL_MS) : 50;

let sessionCounter = 1;
const rooms = new Map<string, GameRoom>();

const app = express();
app.use(cors());
app.use(express.json());

app.get('/health', (_, res) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

app.get('/sessions/:id/state', (req, res) => {
  const room = rooms.get(req.params.id);
  if (!room) {
    res.status(404).json({ error: `session ${req.params.id} not found` });
    return;
  }
  res.json(room.session.getState());
});

const httpServer = createServer(app);
const io = new Server(httpServer, {
  cors: { origin: '*', methods: ['GET', 'POST'] },
});

io.on('connection', (socket: Socket) => {
  console.log(`[Server] 연결: ${socket.id}`);

  // 접속 = 세션 하나 (공격측 플레이어 vs 수비 AI)
  const sessionId = `s_${sessionCounter++}`;
  const room = new GameRoom(sessionId, socket, TICK_INTERVAL_MS);
  rooms.set(sessionId, room);
  room.onDestroy = () => rooms.delete(sessionId);
  room.start();

  socket.on('disconnect', () => {
    console.log(`[Server] 연결 종료: ${socket.id}`);
  });
});

httpServer.listen(PORT, () => {
  console.log(`[Server] 실행 중: http://localhost:${PORT} (tick ${TICK_INTERVAL_MS}ms)`);
});
