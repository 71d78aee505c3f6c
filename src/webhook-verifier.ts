import { createHmac, timingSafeEqual } from 'node:crypto'

function safeEqual(a: string, b: string): boolean {
  const aBuffer = Buffer.from(a, 'utf8')
  const bBuffer = Buffer.from(b, 'utf8')
  if (aBuffer.length !== bBuffer.length) {
    return false
  }
  return timingSafeEqual(aBuffer, bBuffer)
}

/**
 * Verify a Todoist webhook signature using HMAC-SHA256.
 *
 * Todoist signs the raw request body with the app's client secret and sends the
 * digest in the `x-todoist-hmac-sha256` header, base64-encoded. Some senders
 * (and replay tooling) send the lowercase hex digest instead, so both encodings
 * of the locally computed digest are accepted.
 *
 * @param rawBody - The exact request bytes, before any JSON parsing.
 * @param signature - The value of the `x-todoist-hmac-sha256` header.
 * @param secret - The webhook signing secret.
 * @returns `true` if the signature matches either encoding, `false` otherwise.
 */
export function verifyTodoistSignature(
  rawBody: Buffer,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature) {
    return false
  }

  const header = signature.trim()
  if (!header) {
    return false
  }

  const digest = createHmac('sha256', secret).update(rawBody).digest()
  const expectedBase64 = digest.toString('base64')
  const expectedHex = digest.toString('hex')

  // Evaluate both comparisons so timing does not reveal which encoding matched.
  const base64Match = safeEqual(header, expectedBase64)
  const hexMatch = safeEqual(header, expectedHex)
  return base64Match || hexMatch
}
