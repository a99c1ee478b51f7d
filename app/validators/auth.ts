import vine from '@vinejs/vine'
import { messagesProvider } from '#validators/messages'

/**
 * Validates the registration payload
 */
export const registerValidator = vine.compile(
  vine.object({
    username: vine
      .string()
      .trim()
      .minLength(3)
      .maxLength(80)
      .unique({ table: 'users', column: 'username' }),
    email: vine
      .string()
      .trim()
      .email()
      .maxLength(120)
      .normalizeEmail()
      .unique({ table: 'users', column: 'email' }),
    password: vine.string().minLength(8),
    first_name: vine.string().trim().minLength(1).maxLength(50),
    last_name: vine.string().trim().minLength(1).maxLength(50),
    role: vine.enum(['parent', 'educator'] as const),
  })
)
registerValidator.messagesProvider = messagesProvider

/**
 * Validates the login payload. `uid` is either the username or
 * the email address.
 */
export const loginValidator = vine.compile(
  vine.object({
    uid: vine.string().trim(),
    password: vine.string(),
  })
)
loginValidator.messagesProvider = messagesProvider
