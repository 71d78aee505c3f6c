import { isRecord, readId, readRecord, readString } from './json.js'
import type { TodoistWebhookEvent } from './types.js'

/**
 * Decode a raw webhook body into a JSON object envelope.
 * Returns `null` when the body is not JSON or not an object.
 */
export function decodeEnvelope(rawBody: Buffer): Record<string, unknown> | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(rawBody.toString('utf8'))
  } catch {
    return null
  }
  return isRecord(parsed) ? parsed : null
}

/** Normalize a Todoist webhook envelope into a {@link TodoistWebhookEvent}. */
export function parseEvent(
  payload: Record<string, unknown>,
  deliveryId: string,
): TodoistWebhookEvent {
  const eventName = readString(payload, 'event_name') || readString(payload, 'eventName') || ''
  const eventData = readRecord(payload, 'event_data')
  const eventDataExtra = readRecord(payload, 'event_data_extra')
  const isReminder = eventName === 'reminder:fired'

  const taskId = isReminder
    ? readId(eventData, 'item_id') ?? readId(eventData, 'id')
    : readId(eventData, 'id') ?? readId(eventData, 'item_id')

  return {
    delivery_id: deliveryId,
    event_name: eventName,
    user_id: readId(payload, 'user_id'),
    triggered_at: readString(payload, 'triggered_at'),
    task_id: taskId,
    project_id: readId(eventData, 'project_id'),
    update_intent: readString(eventDataExtra, 'update_intent'),
    reminder_id: isReminder ? readId(eventData, 'id') : null,
    raw: payload,
  }
}
