export const PROMPT_TEMPLATES = {
  planner: `You are an expert planning agent. Your job is to create a plan to fulfill a user's request.
Here are the available agents:
- "KnowledgeAgent": Use for questions about internal data.
- "SearchAgent": A general web search agent for public info.
- "SlackAgent": Can post messages to a specific Slack channel.
- "CommunicationAgent": Can make phone calls or send text messages.
- "CalendarAgent": Can interact with a user's calendar.
Based on the user's request, create a JSON array of steps. Each object in the array MUST have an "agent" and an "action" key.
When a step needs the output of an earlier step, reference it with {{search_result}} or {{knowledge_answer}} in its action.
Return only the JSON array.
User Request: "{user_prompt}"
`,

  messaging_parser: `You are a data extraction tool. From the user's text, extract the 'channel' and the 'message'.
The channel name must start with a '#'. The message is the content to be posted.
Respond with ONLY a valid JSON object containing "channel" and "message" keys.

Example Text: "Post a message on #general channel in Slack saying 'Hi, I'm online!'"
Example JSON Output:
{
  "channel": "#general",
  "message": "Hi, I'm online!"
}

Text: "{action_text}"
JSON Output:
`,

  calendar_parser: `You are a data extraction tool. From the user's text, extract event details: 'title', 'start_time', and 'end_time'.
The start and end times must be in ISO 8601 format (YYYY-MM-DDTHH:MM:SS).
The current date is {current_date}. Resolve relative times like "tomorrow" based on this date.
Respond with ONLY a valid JSON object.

Text: "{action_text}"
JSON Output:
`,

  voice_sms_parser: `You are a data extraction tool. From the user's text, extract 'type' ('call' or 'sms'), 'recipient' (a phone number in E.164 format), and 'message'.
Respond with ONLY a valid JSON object.

Text: "{action_text}"
JSON Output:
`,

  search_query_parser: `You are a data extraction tool. From the user's text, extract a concise, effective web search query.
Respond with only the search query as a raw string.

Text: "{action_text}"
Search Query:
`,

  knowledge_answer: `Context: {context}

Question: {question}

Answer based only on the context:`,
} as const;

export type TemplateId = keyof typeof PROMPT_TEMPLATES;

export type PromptData = Record<string, string>;

// `{{` and `}}` stand for literal braces
const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Returns the names of the `{name}` placeholders a template expects.
 * Braces around anything that is not an identifier (JSON examples) are
 * not placeholders.
 */
export function templatePlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(TOKEN)) {
    if (match[1]) names.add(match[1]);
  }
  return [...names];
}

/**
 * Substitutes prompt data into a template. Returns the list of missing
 * placeholders instead of throwing so the client can wrap it in its own
 * error type.
 */
export function fillTemplate(
  template: string,
  data: PromptData,
): { text: string; missing: string[] } {
  const missing = templatePlaceholders(template).filter(
    (name) => !Object.prototype.hasOwnProperty.call(data, name),
  );
  if (missing.length > 0) return { text: template, missing };

  const text = template.replace(TOKEN, (whole, name: string | undefined) => {
    if (name === undefined) return whole[0];
    return data[name];
  });
  return { text, missing };
}
