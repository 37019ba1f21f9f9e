export type RejectionReason = 'empty' | 'too_long';

export type ValidationResult = { ok: true; text: string } | { ok: false; reason: RejectionReason };

// C0 controls and DEL, keeping tab, line feed and carriage return
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;

export function validateInput(raw: string, maxLength: number): ValidationResult {
  if (!raw || raw.trim().length === 0) {
    return { ok: false, reason: 'empty' };
  }
  // counted in characters, not UTF-16 units, so emoji count once
  if (Array.from(raw).length > maxLength) {
    return { ok: false, reason: 'too_long' };
  }
  const text = raw.replace(CONTROL_CHARS, '').trim();
  if (text.length === 0) {
    return { ok: false, reason: 'empty' };
  }
  return { ok: true, text };
}
