export const EMPTY_RESPONSE_FALLBACK =
  "I want to respond thoughtfully to what you've shared. Could you tell me a bit more about what's on your mind?";

const ASSISTANT_MARKERS = ['Assistant:', 'Response:', 'Bot:'];
const DIALOGUE_PREFIXES = ['User:', 'Human:', 'Q:', 'Question:', 'A:'];

function stripEcho(raw: string, promptEcho: string): string {
  if (!promptEcho || !raw.includes(promptEcho)) return raw;
  return raw.split(promptEcho).join('').trim();
}

function afterLastMarker(text: string): string {
  let cut = -1;
  for (const marker of ASSISTANT_MARKERS) {
    const idx = text.lastIndexOf(marker);
    if (idx >= 0 && idx + marker.length > cut) {
      cut = idx + marker.length;
    }
  }
  return cut >= 0 ? text.slice(cut) : text;
}

function isDialogueLine(line: string): boolean {
  return line === '' || DIALOGUE_PREFIXES.some((prefix) => line.startsWith(prefix));
}

// Truncation at the token limit leaves a stub after the last period.
function dropTrailingFragment(text: string): string {
  const sentences = text.split('.');
  const last = sentences[sentences.length - 1] ?? '';
  if (sentences.length > 1 && last.trim().length < 3) {
    return `${sentences.slice(0, -1).join('.')}.`;
  }
  return text;
}

export function cleanResponse(raw: string, promptEcho = ''): string {
  const body = afterLastMarker(stripEcho(raw, promptEcho));
  const joined = body
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => !isDialogueLine(line))
    .join(' ')
    .trim();

  const response = dropTrailingFragment(joined).trim();
  return response.length > 0 ? response : EMPTY_RESPONSE_FALLBACK;
}
