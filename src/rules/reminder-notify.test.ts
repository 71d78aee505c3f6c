import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import type { SqliteLedger } from '../adapters/sqlite.js'
import { evaluateFocusPolicy } from '../policy.js'
import { FakeTaskClient, makeConfig, makeEvent, makeTask, openMemoryLedger } from '../test-fixtures.js'
import type { ReminderConfig } from '../types.js'
import type { RuleContext } from './base.js'
import { ReminderNotifyRule, toTaskContext } from './reminder-notify.js'

const NOW = new Date('2026-03-02T15:30:00Z')
const MINUTE = 60_000
const HOOK_URL = 'https://hooks.example.test/notify'

const reminderEvent = makeEvent({
  event_name: 'reminder:fired',
  task_id: 't1',
  project_id: null,
  reminder_id: 'r1',
})

describe('ReminderNotifyRule', () => {
  const rule = new ReminderNotifyRule()
  let ledger: SqliteLedger
  let tasks: FakeTaskClient

  const makeContext = (reminder: Partial<ReminderConfig> = {}): RuleContext => {
    const config = makeConfig()
    return {
      config: {
        ...config,
        reminder: {
          ...config.reminder,
          webhookUrl: HOOK_URL,
          webhookToken: 'test-hook-token',
          ...reminder,
        },
      },
      ledger,
      tasks,
      policy: evaluateFocusPolicy,
      now: () => NOW,
    }
  }

  beforeEach(async () => {
    ledger = await openMemoryLedger()
    tasks = new FakeTaskClient().addTask(makeTask({ content: 'Write report', labels: ['Focus'] }))
  })

  afterEach(async () => {
    await ledger.close()
  })

  it('matches fired reminders that name a task', () => {
    expect(rule.matches(reminderEvent)).toBe(true)
    expect(rule.matches({ ...reminderEvent, task_id: null })).toBe(false)
    expect(rule.matches(makeEvent())).toBe(false)
  })

  it('plans one hook post for a focus task', async () => {
    const plan = await rule.plan(makeContext(), reminderEvent)

    expect(plan.actions).toHaveLength(1)
    const [action] = plan.actions
    expect(action.action_type).toBe('notify_webhook')
    expect(action.target_id).toBe(HOOK_URL)
    expect(action.meta).toMatchObject({
      task_id: 't1',
      event_name: 'reminder:fired',
      policy_mode: 'ACTIVE_FOCUS_EXECUTION',
      message_mode: 'ACTIVE_FOCUS_EXECUTION',
      cooldown_minutes: 60,
    })
    expect(plan.meta).toMatchObject({
      task_id: 't1',
      reminder_id: 'r1',
      has_focus_label: true,
      policy_reason: 'reminder_focus_task',
      dry_run: false,
    })
  })

  it('builds the hook payload', async () => {
    const plan = await rule.plan(makeContext({ to: 'user-7' }), reminderEvent)
    const [action] = plan.actions
    if (action.action_type !== 'notify_webhook') throw new Error('expected a hook action')

    expect(action.meta.payload).toEqual({
      message: 'Reminder for your focus task "Write report". Start on the next concrete step now.',
      name: 'Focus Follow-up',
      channel: 'discord',
      deliver: true,
      to: 'user-7',
      meta: {
        source: 'todoist-rules-worker',
        event_name: 'reminder:fired',
        task_id: 't1',
        project_id: 'p1',
        reminder_id: 'r1',
        triggered_at: '2026-03-02T15:00:00Z',
        policy_mode: 'ACTIVE_FOCUS_EXECUTION',
        policy_reason: 'reminder_focus_task',
        message_mode: 'ACTIVE_FOCUS_EXECUTION',
        message_reason: 'reminder_focus_task',
      },
    })
  })

  it('suppresses a repeat inside the cooldown window', async () => {
    const lastSent = NOW.getTime() - 30 * MINUTE
    await ledger.recordReminderNotify('t1', 'ACTIVE_FOCUS_EXECUTION', lastSent)

    const plan = await rule.plan(makeContext(), reminderEvent)

    expect(plan).toEqual({
      actions: [],
      meta: {
        reason: 'cooldown_active',
        task_id: 't1',
        mode: 'ACTIVE_FOCUS_EXECUTION',
        cooldown_minutes: 60,
        last_sent_at_ms: lastSent,
      },
    })
  })

  it('notifies again once the window has passed', async () => {
    await ledger.recordReminderNotify('t1', 'ACTIVE_FOCUS_EXECUTION', NOW.getTime() - 61 * MINUTE)
    const plan = await rule.plan(makeContext(), reminderEvent)
    expect(plan.actions).toHaveLength(1)
  })

  it('keys the cooldown by mode', async () => {
    await ledger.recordReminderNotify('t1', 'REMINDER_FOLLOW_UP', NOW.getTime())
    const plan = await rule.plan(makeContext(), reminderEvent)
    expect(plan.actions).toHaveLength(1)
  })

  it('never suppresses with a zero cooldown', async () => {
    await ledger.recordReminderNotify('t1', 'ACTIVE_FOCUS_EXECUTION', NOW.getTime())
    const plan = await rule.plan(makeContext({ cooldownMinutes: 0 }), reminderEvent)
    expect(plan.actions).toHaveLength(1)
  })

  it('needs a hook URL and token', async () => {
    expect((await rule.plan(makeContext({ webhookUrl: null }), reminderEvent)).meta).toEqual({
      reason: 'missing_webhook_url',
      task_id: 't1',
    })
    expect((await rule.plan(makeContext({ webhookToken: null }), reminderEvent)).meta).toEqual({
      reason: 'missing_webhook_token',
      task_id: 't1',
    })
  })

  it('defers to the policy when it declines', async () => {
    tasks.addTask(makeTask({ content: 'Write report', labels: [] }))

    const plan = await rule.plan(makeContext({ requireFocusLabel: true }), reminderEvent)

    expect(plan).toEqual({
      actions: [],
      meta: { reason: 'reminder_task_not_focus', task_id: 't1', mode: 'SKIP' },
    })
  })

  it('frames a reminder before the due time as preparation', async () => {
    tasks.addTask(
      makeTask({
        content: 'Write report',
        due: { date: '2026-03-02', datetime: '2026-03-02T20:00:00Z', is_recurring: false, string: null },
      }),
    )

    const plan = await rule.plan(makeContext(), reminderEvent)
    const [action] = plan.actions
    if (action.action_type !== 'notify_webhook') throw new Error('expected a hook action')

    expect(action.meta.policy_mode).toBe('REMINDER_FOLLOW_UP')
    expect(action.meta.message_mode).toBe('ACTIVE_FOCUS_PREP_WINDOW')
    expect(plan.meta.message_reason).toBe('reminder_before_due_datetime')
    expect(action.meta.payload.message).toBe(
      'Heads up: "Write report" is due at 2026-03-02 14:00. ' +
        'Use the time before then to prepare and decide the first step.',
    )
  })

  it('uses the due date when the task is due on a later day', async () => {
    tasks.addTask(
      makeTask({
        content: 'Write report',
        due: { date: '2026-03-05', datetime: null, is_recurring: false, string: null },
      }),
    )

    const plan = await rule.plan(makeContext(), reminderEvent)

    expect(plan.meta.message_mode).toBe('ACTIVE_FOCUS_PREP_WINDOW')
    expect(plan.meta.message_reason).toBe('reminder_before_due_date')
  })
})

describe('toTaskContext', () => {
  it('normalizes labels and falls back to the id for blank content', () => {
    const context = toTaskContext(
      makeTask({ id: 't9', content: '   ', labels: [' Focus ', 'focus', '', 'Home'] }),
      'America/Chicago',
    )
    expect(context.content).toBe('t9')
    expect(context.labels).toEqual(['focus', 'home'])
  })
})
