/**
 * Live execution logger for matrixprobe.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal; session lines
 * carry the capability label since workers interleave.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function session(label: string, message: string): void {
  write(`🌐 [${label}] ${message}`);
}

export function sessionWarn(label: string, message: string): void {
  write(`⚠️  [${label}] ${message}`);
}

export function translate(label: string, message: string): void {
  write(`🔤 [${label}] ${message}`);
}

export function repeated(label: string, word: string, count: number): void {
  write(`🔁 [${label}] "${word}" × ${String(count)}`);
}

export function verdict(label: string, passed: boolean, reason?: string): void {
  const icon = passed ? '✅' : '❌';
  const suffix = reason !== undefined ? ` — ${reason}` : '';
  write(`${icon} [${label}] ${passed ? 'PASSED' : 'FAILED'}${suffix}`);
}
