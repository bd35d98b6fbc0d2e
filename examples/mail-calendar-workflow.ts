/**
 * Mail & Calendar Workflow Demo
 *
 * Walks an agent-style workflow through the registry against an in-memory
 * mail/calendar backend: list categories, discover, resolve on demand,
 * then chain invocations. Ends with the three failure statuses.
 *
 * Run: npm run demo
 */

import chalk from 'chalk';
import { config as loadEnv } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  configureLogger,
  createInMemoryTransport,
  createToolRegistry,
  loadConfig,
  sleep,
  type InvocationResult,
  type ToolHandler,
} from '../src/index.js';

const CATALOG = fileURLToPath(new URL('./catalog/mail-calendar.json', import.meta.url));

// =============================================================================
// MOCK BACKEND
// =============================================================================

const mailbox = [
  {
    id: 'm-101',
    from: 'dana@example.com',
    subject: 'Quarterly planning',
    body: 'Can we find 45 minutes on Thursday to go over the plan?',
    unread: true,
  },
  {
    id: 'm-100',
    from: 'ops@example.com',
    subject: 'Maintenance window',
    body: 'The mail gateway restarts at 02:00 UTC.',
    unread: false,
  },
];

const contacts: Record<string, { name: string; title: string }> = {
  'dana@example.com': { name: 'Dana Ortiz', title: 'Product Lead' },
};

function text(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  return typeof value === 'string' ? value : '';
}

const handlers: Record<string, ToolHandler> = {
  list_emails: (args) =>
    mailbox
      .filter((m) => !args.unread_only || m.unread)
      .map(({ id, from, subject }) => ({ id, from, subject })),
  read_email: (args) => {
    const message = mailbox.find((m) => m.id === text(args, 'id'));
    if (!message) throw new Error(`No email with id ${text(args, 'id')}`);
    return message;
  },
  lookup_contact: (args) => contacts[text(args, 'email')] ?? null,
  find_free_slots: (args) => [
    { start: `${text(args, 'date')}T10:00:00Z`, minutes: args.duration_minutes },
    { start: `${text(args, 'date')}T15:30:00Z`, minutes: args.duration_minutes },
  ],
  create_event: (args) => ({ eventId: 'evt-7', subject: args.subject, start: args.start }),
  send_email: (args) => ({ messageId: 'out-3', to: args.to }),
  sync_directory: async (_args, ctx) => {
    await sleep(5_000, ctx.token);
    return 'synced';
  },
};

const EmailSummaries = z.array(z.object({ id: z.string(), from: z.string(), subject: z.string() }));
const Contact = z.object({ name: z.string(), title: z.string() });
const Slots = z.array(z.object({ start: z.string() }));

function show(result: InvocationResult): void {
  if (result.status === 'Ok') {
    console.log(chalk.green(`     ✓ ${result.toolName} (${result.durationMs}ms)`), JSON.stringify(result.value));
  } else {
    console.log(chalk.red(`     ✗ ${result.toolName} → ${result.status}: ${result.error.message}`));
  }
}

// =============================================================================
// MAIN
// =============================================================================

async function main(): Promise<void> {
  loadEnv();
  const { config, warnings } = loadConfig();
  for (const warning of warnings) {
    console.log(chalk.yellow(`   ⚠ ${warning}`));
  }
  configureLogger({ level: config.logLevel ?? 'warn' });

  const registry = await createToolRegistry({
    transport: createInMemoryTransport(handlers),
    config: { ...config, catalogPaths: [...(config.catalogPaths ?? []), CATALOG] },
  });

  registry.on((event) => {
    switch (event.type) {
      case 'transport_call':
        console.log(chalk.cyan(`   → ${event.tool} ${JSON.stringify(event.arguments)}`));
        break;
      case 'validation_failed':
        console.log(chalk.yellow(`   ! ${event.tool}: ${event.message}`));
        break;
    }
  });

  console.log(chalk.bold('\n📚 Categories\n'));
  for (const { category, count } of await registry.categories()) {
    console.log(`   ${category.padEnd(10)} ${count} tools`);
  }

  console.log(chalk.bold('\n🔎 Discovery (names only)\n'));
  console.log(`   email:  ${(await registry.discover('email')).map((e) => e.name).join(', ')}`);
  console.log(`   search "free slots": ${(await registry.search('free slots')).map((e) => e.name).join(', ')}`);

  console.log(chalk.bold('\n📄 Resolve on demand\n'));
  console.log(`   ${await registry.signature('find_free_slots')}`);
  console.log(chalk.gray(JSON.stringify(await registry.describe('send_email'), null, 2).replace(/^/gm, '   ')));
  console.log(`   resolved so far: ${registry.resolvedCount}`);

  console.log(chalk.bold('\n🗓  Workflow\n'));
  const unread = await registry.invoke({ toolName: 'list_emails', arguments: { unread_only: true } });
  show(unread);
  if (unread.status !== 'Ok') return;

  const [first] = EmailSummaries.parse(unread.value);
  if (!first) {
    console.log('   Inbox zero.');
    return;
  }

  show(await registry.invoke({ toolName: 'read_email', arguments: { id: first.id } }));

  const contact = await registry.invoke({ toolName: 'lookup_contact', arguments: { email: first.from } });
  show(contact);
  const who = contact.status === 'Ok' ? Contact.safeParse(contact.value) : undefined;
  const name = who?.success ? who.data.name : first.from;

  const slots = await registry.invoke({
    toolName: 'find_free_slots',
    arguments: { attendees: [first.from], date: '2026-10-22', duration_minutes: 45 },
  });
  show(slots);
  if (slots.status !== 'Ok') return;
  const [slot] = Slots.parse(slots.value);
  if (!slot) return;

  show(
    await registry.invoke({
      toolName: 'create_event',
      arguments: { subject: first.subject, start: slot.start, end: slot.start, attendees: [first.from] },
    })
  );
  show(
    await registry.invoke({
      toolName: 'send_email',
      arguments: {
        to: [first.from],
        subject: `Re: ${first.subject}`,
        body: `Hi ${name}, I've sent an invite for ${slot.start}.`,
      },
    })
  );

  console.log(chalk.bold('\n⚠️  Failure statuses\n'));
  show(await registry.invoke({ toolName: 'send_email', arguments: { to: ['x@example.com'], body: 'no subject' } }));
  show(await registry.invoke({ toolName: 'delete_everything', arguments: {} }));
  show(await registry.invoke({ toolName: 'sync_directory', arguments: {} }, { timeoutMs: 100 }));

  console.log(chalk.gray(`\n   ${registry.resolvedCount} of ${(await registry.discover()).length} descriptors resolved`));
  registry.dispose();
}

main().catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exitCode = 1;
});
