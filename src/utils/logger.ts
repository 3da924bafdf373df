/**
 * Live execution logger for agentwire.
 *
 * All output goes to stderr so stdout stays clean for JSON contract output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

function indent(depth: number): string {
  return '  '.repeat(depth);
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

export function composite(depth: number, kind: string, name: string, childCount: number): void {
  const icon = kind === 'parallel' ? '🔀' : '⏩';
  write(`${indent(depth)}${icon} ${name} (${kind}, ${String(childCount)} children)`);
}

export function agent(depth: number, name: string): void {
  write(`${indent(depth)}🤖 ${name}`);
}

export function agentResult(depth: number, name: string, success: boolean, outputKey?: string): void {
  const icon = success ? '✅' : '❌';
  const target = outputKey !== undefined ? ` → ${outputKey}` : '';
  write(`${indent(depth)}${icon} ${name}${target}`);
}

export function tool(depth: number, agentName: string, toolName: string): void {
  write(`${indent(depth)}🔧 ${agentName} → ${toolName}`);
}

export function retry(label: string, attempt: number, attempts: number, waitMs: number, reason: string): void {
  write(
    `🔁 ${label}: attempt ${String(attempt)}/${String(attempts)} failed (${reason}), retrying in ${(waitMs / 1000).toFixed(1)}s`,
  );
}

export function llm(message: string): void {
  write(`🧠 ${message}`);
}
