/**
 * Basic Channel Example
 *
 * Connects to a Phoenix-style endpoint, joins a topic, pushes one message
 * and prints everything the topic broadcasts for a few seconds.
 *
 * Run with: npx tsx examples/channel-basic.ts [ws://localhost:4000/socket/websocket]
 */

import { Socket, ReplyError } from '../src/index.ts';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  const url = process.argv[2] ?? 'ws://localhost:4000/socket/websocket';

  // 1. Create the socket; heartbeats keep the server from idling us out
  const socket = new Socket(url, { heartbeatIntervalMs: 30000, reconnectDelayMs: 2000 });
  socket.onOpen(() => console.log('[Socket] Open'));
  socket.onClose((reason) => console.log(`[Socket] Closed: ${reason}`));
  socket.onError((error) => console.log(`[Socket] Error: ${error}`));

  await socket.connect({ token: 'test-token' });

  // 2. Join a topic (sent as soon as the socket opens)
  const room = socket.channel('room:lobby', { nickname: 'example' });
  room.on('new_msg', (payload: unknown) => console.log('[room:lobby] new_msg', payload));

  try {
    const response = await room.join();
    console.log('[Channel] Joined', response);

    // 3. Push and wait for the server's reply
    const reply = await room.push('new_msg', { body: 'hello from node' });
    console.log('[Channel] Reply', reply);
  } catch (err) {
    if (err instanceof ReplyError) {
      console.error(`[Channel] Server answered ${err.status}:`, err.response);
    } else {
      console.error('[Channel] Error:', err);
    }
  }

  // 4. Listen for a while, then clean up
  await delay(5000);
  await room.leave();
  await socket.disconnect();
  console.log('[Socket] Done');
}

main().catch(console.error);
