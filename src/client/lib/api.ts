import type {
  AnalysisRequest,
  ApiResponse,
  PublicConfig,
  StreamEvent,
  SummaryRequest,
  TrendSummary,
} from '../../shared/api.js';

async function readError(res: Response): Promise<string> {
  try {
    const body: ApiResponse<unknown> = await res.json();
    return body.error || `Request failed (${res.status})`;
  } catch {
    return `Request failed (${res.status})`;
  }
}

export async function fetchPublicConfig(): Promise<PublicConfig> {
  const res = await fetch('/api/config');
  if (!res.ok) throw new Error(await readError(res));
  const body: ApiResponse<PublicConfig> = await res.json();
  if (!body.data) throw new Error('Server returned no configuration');
  return body.data;
}

/**
 * Posts the request to the SSE endpoint and hands every `data:` event to
 * `onEvent` as it arrives.
 */
export async function streamAnalysis(
  idToken: string,
  request: AnalysisRequest,
  onEvent: (event: StreamEvent) => void,
): Promise<void> {
  const res = await fetch('/api/stream-analyze', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${idToken}` },
    body: JSON.stringify(request),
  });

  if (!res.ok) throw new Error(await readError(res));
  if (!res.body) throw new Error('No stream');

  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;

    buffer += decoder.decode(value, { stream: true });

    const lines = buffer.split('\n');
    buffer = lines.pop() || '';

    for (const line of lines) {
      if (!line.startsWith('data:')) continue;

      const json = line.replace(/^data:\s*/, '');
      if (!json) continue;

      const event: StreamEvent = JSON.parse(json);
      onEvent(event);
    }
  }
}

export async function requestSummary(idToken: string, request: SummaryRequest): Promise<TrendSummary> {
  const res = await fetch('/api/summarize', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', Authorization: `Bearer ${idToken}` },
    body: JSON.stringify(request),
  });
  if (!res.ok) throw new Error(await readError(res));
  const body: ApiResponse<TrendSummary> = await res.json();
  if (!body.data) throw new Error(body.error || 'Summary failed');
  return body.data;
}
