import { PhoneNumber } from '../../accounts/entities/phone-number.entity';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
};

/**
 * Escapes text for messages sent with HTML parse mode.
 */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>]/g, (char) => HTML_ESCAPES[char] ?? char);
}

function formatTimestamp(value: Date | null): string {
  if (!value) {
    return 'never';
  }

  return `${value.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

export function formatNumberDetails(record: PhoneNumber, hasSession: boolean): string {
  return [
    `📱 <b>${escapeHtml(record.phoneNumber)}</b>`,
    '',
    `Status: ${record.isAuthenticated ? '✅' : '⏳'} ${record.status}`,
    `Added: ${formatTimestamp(record.addedAt)}`,
    `Last login: ${formatTimestamp(record.lastLoginAt)}`,
    `Session: ${hasSession ? 'saved' : 'none'}`,
  ].join('\n');
}

/**
 * Extracts the command name from `/name` or `/name@bot args`.
 */
export function parseCommand(text: string): string | null {
  if (!text.startsWith('/')) {
    return null;
  }

  const [token] = text.trim().split(/\s+/);
  const [command] = token.split('@');
  return command.toLowerCase();
}
