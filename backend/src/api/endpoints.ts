export interface EndpointInfo {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  description: string;
}

/**
 * Routes served under /api, listed in the startup banner
 */
export const API_ENDPOINTS: readonly EndpointInfo[] = [
  { method: 'GET', path: '/api/health', description: 'Check service status' },
  { method: 'POST', path: '/api/upload', description: 'Upload a subtitle, image, video or audio file' },
  { method: 'GET', path: '/api/runs', description: 'List all runs' },
  { method: 'POST', path: '/api/runs', description: 'Validate inputs and create a run' },
  { method: 'GET', path: '/api/runs/:id', description: 'Run details and pending discard request' },
  { method: 'POST', path: '/api/runs/:id/start', description: 'Start processing' },
  { method: 'POST', path: '/api/runs/:id/discard', description: 'Discard a line from the current overlap' },
  { method: 'POST', path: '/api/runs/:id/abort', description: 'Abort overlap resolution or an interrupted run' },
  { method: 'GET', path: '/api/runs/:id/download', description: 'Download the chart manifest' },
  { method: 'DELETE', path: '/api/runs/:id', description: 'Delete a run' },
];

/**
 * One banner line per endpoint, with aligned columns
 */
export function formatEndpointList(endpoints: readonly EndpointInfo[] = API_ENDPOINTS): string[] {
  const methodWidth = Math.max(...endpoints.map((e) => e.method.length));
  const pathWidth = Math.max(...endpoints.map((e) => e.path.length));

  return endpoints.map(
    (e) => `   - ${e.method.padEnd(methodWidth)} ${e.path.padEnd(pathWidth)} - ${e.description}`
  );
}
