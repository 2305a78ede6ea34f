import type { Guide } from './types'

export const networkingGuide: Guide = {
  id: 'guide-networking',
  title: 'Networking Protocols',
  subtitle: 'From a domain name to bytes on a socket',
  color: 'cyan',
  icon: '🌐',
  sections: [
    {
      id: 'request',
      title: 'Anatomy of a Request',
      content: [
        {
          type: 'diagram',
          nodes: [
            { id: 'dns', label: 'DNS lookup', icon: '📖' },
            { id: 'tcp', label: 'TCP handshake', icon: '🤝' },
            { id: 'tls', label: 'TLS handshake', icon: '🔒' },
            { id: 'http', label: 'HTTP request', icon: '📨' },
          ],
          connections: [
            { from: 'dns', to: 'tcp', label: 'IP address' },
            { from: 'tcp', to: 'tls' },
            { from: 'tls', to: 'http', label: 'encrypted' },
          ],
        },
        {
          type: 'concept-card',
          term: 'DNS',
          explanation: 'Turns a name into an address, through caches and then root, TLD and authoritative servers.',
        },
        {
          type: 'concept-card',
          term: 'TCP',
          explanation: 'Reliable, ordered byte stream. SYN, SYN-ACK, ACK opens it.',
        },
        {
          type: 'concept-card',
          term: 'TLS',
          explanation: 'Authenticates the server with a certificate and encrypts the stream.',
        },
        {
          type: 'concept-card',
          term: 'HTTP',
          explanation: 'Request and response messages with a method, headers and body.',
        },
      ],
    },
    {
      id: 'choices',
      title: 'Choosing a Transport',
      content: [
        {
          type: 'comparison',
          leftLabel: 'TCP',
          rightLabel: 'UDP',
          rows: [
            { label: 'Delivery', left: 'Guaranteed and ordered', right: 'Best effort' },
            { label: 'Connection', left: 'Handshake first', right: 'None' },
            { label: 'Typical use', left: 'HTTP/1.1, HTTP/2, WebSocket', right: 'DNS, games, media, HTTP/3 (QUIC)' },
          ],
        },
        {
          type: 'text',
          body: 'A WebSocket starts as an HTTP request with Upgrade: websocket. After the server answers 101 Switching Protocols the same TCP connection carries frames in both directions, which is what the real-time demo listens to.',
        },
        {
          type: 'quiz',
          question: 'Which status code completes a WebSocket upgrade?',
          options: ['200 OK', '101 Switching Protocols', '301 Moved Permanently'],
          correctIndex: 1,
          explanation: '101 tells the client the server is switching to the protocol named in the Upgrade header.',
        },
      ],
    },
  ],
  connections: [
    { concept: 'WebSocket client', file: 'src/hooks/useWebSocket.ts', description: 'Opens, reconnects and closes the socket' },
    { concept: 'Aborting requests', file: 'src/hooks/useFetch.ts', description: 'AbortController ends a request the page no longer needs' },
  ],
}
