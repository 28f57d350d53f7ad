/** Build a real `Response` carrying a JSON body, as `fetch` would resolve it. */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}
