import vine from '@vinejs/vine'
import { messagesProvider } from '#validators/messages'

/**
 * Only checks the shape of the payload. Whether the status is one
 * of the known ones is decided by the progress tracker.
 */
export const updateActivityStatusValidator = vine.compile(
  vine.object({
    status: vine.string().trim(),
  })
)
updateActivityStatusValidator.messagesProvider = messagesProvider
