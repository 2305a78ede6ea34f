import type { Guide } from './types'

export const realtimeGuide: Guide = {
  id: 'guide-realtime',
  title: 'Real-Time Data',
  subtitle: 'One WebSocket, validated messages, reconnect with backoff',
  color: 'emerald',
  icon: '📈',
  sections: [
    {
      id: 'socket',
      title: 'Owning the Socket',
      content: [
        {
          type: 'text',
          body: 'The socket is opened in an effect and closed in its cleanup. When the connection drops, the hook waits and tries again, doubling the wait each time up to a cap. Closing from the cleanup sets a flag first so the close handler does not schedule a reconnect for a component that is gone.',
        },
        {
          type: 'code',
          language: 'typescript',
          code: `export function backoffDelay(attempt: number): number {
  return Math.min(RECONNECT_MAX_MS, RECONNECT_BASE_MS * 2 ** attempt)
}
// 500, 1000, 2000, 4000, 8000, 8000, ...`,
        },
        {
          type: 'concept-card',
          term: 'Status',
          explanation: 'idle, connecting, open, reconnecting or closed, shown as a badge.',
        },
        {
          type: 'concept-card',
          term: 'Latest callback',
          explanation: 'onMessage is read through a ref, so a new handler does not reopen the socket.',
        },
      ],
    },
    {
      id: 'messages',
      title: 'Trust Nothing on the Wire',
      content: [
        {
          type: 'text',
          body: 'A frame is just a string. parseTickerMessage parses it, checks that symbol is a string and price and timestamp are finite numbers, and returns null otherwise. The reducer only ever sees valid messages, keeps the latest quote per symbol and a log of the last twenty.',
        },
        {
          type: 'callout',
          tone: 'info',
          body: 'With no VITE_TICKER_URL configured the demo runs a seeded in-process simulator on a single interval, so it works offline and behaves the same in tests.',
        },
        {
          type: 'comparison',
          leftLabel: 'Polling',
          rightLabel: 'WebSocket',
          rows: [
            { label: 'Latency', left: 'Up to one poll interval', right: 'As soon as the server sends' },
            { label: 'Requests', left: 'One per poll', right: 'One connection' },
            { label: 'Direction', left: 'Client asks', right: 'Both sides push' },
          ],
        },
        {
          type: 'quiz',
          question: 'What is the wait before the fourth reconnect attempt (attempt index 3)?',
          options: ['2000 ms', '4000 ms', '8000 ms'],
          correctIndex: 1,
          explanation: '500 × 2³ = 4000, which is under the 8000 ms cap.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'Socket hook', file: 'src/hooks/useWebSocket.ts', description: 'Status, reconnect with backoff, cleanup' },
    { concept: 'Message parsing', file: 'src/services/ticker.ts', description: 'Validation and the simulated feed' },
    { concept: 'Quotes state', file: 'src/state/tickerReducer.ts', description: 'Latest price per symbol and the message log' },
  ],
}
