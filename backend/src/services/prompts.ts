export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export const ANALYST_SYSTEM_PROMPT =
  'You are a professional news analyst. You read one article at a time and report on it factually.';

export function buildAnalysisMessages(title: string, content: string): ChatMessage[] {
  return [
    { role: 'system', content: ANALYST_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Analyze the following news article.

1. Summarize it in 2-3 concise sentences, focusing on key facts and important implications.
2. Extract 3-5 key points, each a single clear sentence.
3. Classify the overall sentiment (tone, implications and context) as exactly one of: positive, negative, neutral.

Respond with JSON only, no other text:
{"summary": "...", "keyPoints": ["...", "..."], "sentiment": "positive|negative|neutral"}

Title: ${title}

Content: ${content}`,
    },
  ];
}

export function buildOverviewMessages(titles: string[]): ChatMessage[] {
  return [
    { role: 'system', content: ANALYST_SYSTEM_PROMPT },
    {
      role: 'user',
      content: `Based on these news article titles, identify the main themes, trends and topics being discussed.
Provide a brief analysis (3-4 sentences) of what is currently newsworthy. Plain text only.

Article Titles:
${titles.map(t => `- ${t}`).join('\n')}`,
    },
  ];
}
