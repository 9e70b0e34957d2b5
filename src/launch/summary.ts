/**
 * Connection Summary
 *
 * Text shown to the operator once the server is up.
 */

export interface EndpointInfo {
  method: 'GET' | 'POST';
  path: string;
  description: string;
}

export const API_ENDPOINTS: readonly EndpointInfo[] = [
  { method: 'GET', path: '/api/health', description: 'Health check' },
  { method: 'POST', path: '/api/session/create', description: 'Create a chat session' },
  { method: 'POST', path: '/api/upload', description: 'Upload PDF documents (multipart: session_id, files)' },
  { method: 'POST', path: '/api/query', description: 'Ask a question (JSON: session_id, query)' },
  { method: 'GET', path: '/api/history', description: 'Conversation history (?session_id=)' },
  { method: 'POST', path: '/api/session/clear', description: 'Clear session history' },
  { method: 'GET', path: '/api/collections', description: 'List document collections' }
];

export function formatEndpoint(endpoint: EndpointInfo): string {
  return `${endpoint.method.padEnd(5)}${endpoint.path.padEnd(22)}${endpoint.description}`;
}

export interface SummaryOptions {
  baseUrl: string;
  testPage: string;
  /** Whether the readiness probe succeeded */
  ready: boolean;
  pid?: number;
  logFile?: string;
  /** Gemini model the server will use */
  model?: string;
}

export function buildSummary(options: SummaryOptions): string[] {
  const lines = [
    '════════════════════════════════════════',
    options.ready ? '  UniMate API running!' : '  UniMate API started (not yet responding)',
    '',
    `  API URL:    ${options.baseUrl}`,
    `  Test page:  open ${options.testPage} in your browser`
  ];

  if (options.model) {
    lines.push(`  Model:      ${options.model}`);
  }
  if (options.pid !== undefined) {
    lines.push(`  Server PID: ${options.pid}`);
  }
  if (options.logFile) {
    lines.push(`  Server log: ${options.logFile}`);
  }

  lines.push(
    '',
    '  Integration:',
    '    - Create a session first and pass its session_id to every call',
    '    - CORS is enabled, so any web page can call the API directly',
    `    - Point your chatbot widget at ${options.baseUrl}/api`,
    '',
    '  Endpoints:'
  );

  for (const endpoint of API_ENDPOINTS) {
    lines.push(`    ${formatEndpoint(endpoint)}`);
  }

  lines.push(
    '',
    '  Press any key to stop the server',
    '════════════════════════════════════════'
  );

  return lines;
}
