import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { SqliteLedger } from '../adapters/sqlite.js'
import { evaluateFocusPolicy } from '../policy.js'
import { FakeTaskClient, makeConfig, makeEvent, makeTask, openMemoryLedger } from '../test-fixtures.js'
import type { WorkerConfig } from '../types.js'
import type { RuleContext } from './base.js'
import { RecurringClearCommentsRule } from './recurring-clear-comments.js'

describe('RecurringClearCommentsRule', () => {
  const rule = new RecurringClearCommentsRule()
  let ledger: SqliteLedger
  let tasks: FakeTaskClient

  const makeContext = (overrides: Partial<WorkerConfig> = {}): RuleContext => ({
    config: makeConfig(overrides),
    ledger,
    tasks,
    policy: evaluateFocusPolicy,
    now: () => new Date('2026-03-02T15:30:00Z'),
  })

  beforeEach(async () => {
    ledger = await openMemoryLedger()
    tasks = new FakeTaskClient().addTask(makeTask())
    tasks.comments.set('t1', [
      { id: 'c1', content: '[keep] standing notes' },
      { id: 'c2', content: '  [KEEP] gate code' },
      { id: 'c3', content: 'watered the ferns' },
      { id: 'c4', content: 'skipped the cactus' },
    ])
  })

  afterEach(async () => {
    await ledger.close()
  })

  it('matches completions only', () => {
    expect(rule.matches(makeEvent())).toBe(true)
    expect(
      rule.matches(makeEvent({ event_name: 'item:updated', update_intent: 'item_completed' })),
    ).toBe(true)
    expect(rule.matches(makeEvent({ event_name: 'item:updated' }))).toBe(false)
    expect(rule.matches(makeEvent({ event_name: 'reminder:fired' }))).toBe(false)
    expect(rule.matches(makeEvent({ task_id: null }))).toBe(false)
  })

  it('plans deletes for every comment without a keep marker', async () => {
    const plan = await rule.plan(makeContext(), makeEvent())

    expect(plan.actions).toEqual([
      { action_type: 'delete_comment', target_type: 'comment', target_id: 'c3', meta: { task_id: 't1' } },
      { action_type: 'delete_comment', target_type: 'comment', target_id: 'c4', meta: { task_id: 't1' } },
    ])
    expect(plan.meta).toEqual({
      task_id: 't1',
      is_recurring: true,
      kept_count: 2,
      delete_count: 2,
      cap_hit: false,
      dry_run: false,
    })
  })

  it('stops at the cap', async () => {
    const plan = await rule.plan(makeContext({ maxDeleteComments: 1 }), makeEvent())

    expect(plan.actions.map((a) => a.target_id)).toEqual(['c3'])
    expect(plan.meta).toMatchObject({ delete_count: 1, cap_hit: true })
  })

  it('honours custom keep markers', async () => {
    const plan = await rule.plan(makeContext({ keepMarkers: ['watered'] }), makeEvent())
    expect(plan.actions.map((a) => a.target_id)).toEqual(['c1', 'c2', 'c4'])
  })

  it('leaves non-recurring tasks alone', async () => {
    tasks.addTask(makeTask({ due: { date: '2026-03-02', datetime: null, is_recurring: false, string: null } }))

    const plan = await rule.plan(makeContext(), makeEvent())

    expect(plan).toEqual({ actions: [], meta: { reason: 'not_recurring', task_id: 't1' } })
  })

  it('treats a task without a due date as non-recurring', async () => {
    tasks.addTask(makeTask({ due: null }))
    const plan = await rule.plan(makeContext(), makeEvent())
    expect(plan.meta.reason).toBe('not_recurring')
  })

  it('reports a missing task id', async () => {
    const plan = await rule.plan(makeContext(), makeEvent({ task_id: null }))
    expect(plan).toEqual({ actions: [], meta: { reason: 'missing_task_id' } })
  })
})
