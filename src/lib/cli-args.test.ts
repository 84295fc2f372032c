import test from 'node:test';
import assert from 'node:assert/strict';
import { parseCommand, positiveIntOption } from './cli-args.js';

test('separates command, positionals, options and flags', () => {
  const parsed = parseCommand(['worker', '--concurrency', '4', 'extra', '--verbose'], ['--concurrency']);

  assert.equal(parsed.command, 'worker');
  assert.deepEqual(parsed.positional, ['extra']);
  assert.deepEqual([...parsed.options], [['--concurrency', '4']]);
  assert.deepEqual([...parsed.flags], ['--verbose']);
});

test('accepts --name=value for any option', () => {
  const parsed = parseCommand(['tasks:submit', '--data={"x":1}']);
  assert.equal(parsed.options.get('--data'), '{"x":1}');
});

test('does not let an unknown flag swallow the next argument', () => {
  const parsed = parseCommand(['tasks:show', '--json', 'task-1']);

  assert.deepEqual(parsed.positional, ['task-1']);
  assert.deepEqual([...parsed.flags], ['--json']);
});

test('reports no command for an empty argv', () => {
  assert.equal(parseCommand([]).command, null);
});

test('positiveIntOption validates the value', () => {
  assert.equal(positiveIntOption(parseCommand(['worker', '--concurrency=3']), '--concurrency'), 3);
  assert.equal(positiveIntOption(parseCommand(['worker']), '--concurrency'), undefined);
  assert.throws(
    () => positiveIntOption(parseCommand(['worker', '--concurrency=0']), '--concurrency'),
    /--concurrency must be an integer >= 1/
  );
});
