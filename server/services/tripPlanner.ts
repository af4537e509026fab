/**
 * Trip Planner AI
 *
 * Sends the trip document to the chat model and returns the itinerary as
 * plain text. Single request, no timeout, no retry. Every failure comes
 * back as a message string for the user instead of an exception.
 */

import { getAIClient, type AIClient } from './aiClientFactory';
import type { Lookup } from '../config';

// ============================================================================
// PROMPT
// ============================================================================

export const DISABLED_PREFIX = '(Trip planner AI disabled)';
export const CALL_FAILED_PREFIX = 'Error calling trip planner AI:';
export const UNEXPECTED_RESPONSE = 'Unexpected response format from trip planner AI.';

export const PLANNER_SYSTEM_PROMPT = [
  'You are an expert road-trip planner.',
  'The user will not see the JSON configuration you receive, but it fully describes their preferences for this trip.',
  '',
  'Your tasks:',
  '- Read the configuration carefully.',
  '- Design a realistic, day-by-day itinerary that respects:',
  '  - Maximum daily driving hours',
  '  - Total days available',
  '  - Trip direction (one-way vs round-trip)',
  '  - Points of interest and their priorities',
  "- Every point_of_interest whose priority is 'must_do' is MANDATORY:",
  '  - You MUST schedule a clear stop or activity that satisfies each must_do point of interest.',
  '  - Mention it explicitly, using language that matches its label and details.',
  '  - If it truly cannot fit the time or route constraints, explain briefly at the end why.',
  '- For major stops, include:',
  '  - Specific hotel or lodging names that fit the lodging style',
  '  - Specific restaurant names, including at least one nice or special option per key stop',
  '  - Specific attractions or activities (museums, tours, viewpoints, hikes, historic sites, shopping, etc.)',
  '- When suggesting specific places:',
  '  - Prefer real, known places.',
  '  - Mention the city or neighborhood and a short reason it fits.',
  '  - For shopping-related points of interest, name at least one mall or retail district and mark that time as shopping.',
  '  - You may mention booking platforms or official websites, but do not invent specific URLs.',
  '- At the end, include a brief reminder to double-check:',
  '  - Hotel prices and availability',
  '  - Restaurant hours and reservations',
  '  - Attraction opening hours',
  '  - Driving times and road conditions.',
  '',
  'Output:',
  '- A clear, human-readable itinerary (no JSON), grouped by day.',
  '- Each day should indicate:',
  '  - Start location and end location',
  '  - Driving time estimate',
  '  - Main stops or activities',
  '  - At least one suggested place to stay (where relevant)',
  '  - At least one suggested restaurant (where relevant)',
  '  - Any must_do points of interest scheduled that day (call them out clearly).',
].join('\n');

export function buildUserMessage(documentText: string): string {
  return `Here is the trip configuration:\n\`\`\`json\n${documentText}\n\`\`\``;
}

// ============================================================================
// PLANNING
// ============================================================================

/**
 * Ask the model for an itinerary. The client lookup is injectable so the
 * route and tests can supply their own.
 */
export async function askForItinerary(
  documentText: string,
  client: Lookup<AIClient> = getAIClient(),
): Promise<string> {
  if (!client.ok) {
    return `${DISABLED_PREFIX} ${client.error}`;
  }

  const { openai, model } = client.value;

  try {
    const response = await openai.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: PLANNER_SYSTEM_PROMPT },
        { role: 'user', content: buildUserMessage(documentText) },
      ],
    });

    const texts = (response.choices ?? [])
      .map((choice) => choice.message?.content?.trim() ?? '')
      .filter((text) => text.length > 0);

    if (texts.length === 0) {
      console.warn('[TripPlanner] Model returned no text content');
      return UNEXPECTED_RESPONSE;
    }
    return texts.join('\n');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[TripPlanner] Itinerary request failed:', message);
    return `${CALL_FAILED_PREFIX} ${message}`;
  }
}
