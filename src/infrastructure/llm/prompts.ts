/**
 * Prompts for the two LLM steps of memory ingestion.
 *
 * Both ask for a JSON object so replies can be validated before use.
 */

export function factExtractionPrompt(today: string): string {
  return `
You turn conversations into long-term memories about the user.

Extract short, self-contained facts worth remembering across sessions:
personal details, preferences, plans, relationships, habits, opinions,
work and project details, and anything the user asks to be remembered.

RULES:
- One fact per entry, written in the third person without the user's name
  (e.g. "Likes green tea", "Is moving to Lisbon in May").
- Use the user's own wording where possible; keep the language of the input.
- Ignore small talk, greetings and what the assistant says about itself.
- Resolve relative dates against today's date: ${today}.
- If nothing is worth remembering, return an empty list.

Reply with JSON only, in this shape:
{"facts": ["fact one", "fact two"]}
`.trim();
}

export const MEMORY_RECONCILE_PROMPT = `
You maintain a user's memory store. You are given the existing memories (each
with an id) and newly extracted facts. Decide for each fact and each affected
memory what happens:

- ADD: the fact is new information. Use a fresh id (any value).
- UPDATE: the fact refines or corrects an existing memory. Keep that memory's
  id and put the merged text in "text".
- DELETE: the fact contradicts an existing memory so it must be removed. Keep
  that memory's id and its current text.
- NONE: the fact is already covered by an existing memory. Keep its id.

Only use ids that appear in the existing memories for UPDATE, DELETE and NONE.

Reply with JSON only, in this shape:
{"memory": [{"id": "0", "text": "...", "event": "UPDATE"}]}
`.trim();

export function reconcileInput(
  existing: { id: string; text: string }[],
  facts: string[]
): string {
  return [
    "Existing memories:",
    JSON.stringify(existing),
    "",
    "New facts:",
    JSON.stringify(facts),
  ].join("\n");
}
