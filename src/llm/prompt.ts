import { Observation } from '../core/types'

export const SYSTEM_PROMPT = `You check whether websites are working.
You are given what a browser saw when it opened a page: the HTTP status, the final URL after redirects, the page title and the visible text.

Decide the site's status:
- "UP" if the page loaded and shows the site's normal content (a login page or a cookie banner counts as UP).
- "DOWN" if the page shows an outage, a maintenance notice, a server error, a browser error page or nothing at all.
- "UNKNOWN" if you cannot tell from what was observed.

Respond with a single JSON object and nothing else:
{"status": "UP" | "DOWN" | "UNKNOWN", "reason": "brief explanation of what you see"}`

export function buildUserMessage(observation: Observation): string {
  return [
    `URL: ${observation.url}`,
    `Reachable: ${observation.reachable ? 'yes' : 'no'}`,
    `HTTP status: ${observation.httpStatus ?? 'none'}`,
    `Load time: ${observation.latencyMs} ms`,
    '',
    'Page signal:',
    observation.rawSignal,
  ].join('\n')
}
