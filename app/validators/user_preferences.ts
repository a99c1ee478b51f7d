import vine from '@vinejs/vine'
import { messagesProvider } from '#validators/messages'

export const THEME_PREFERENCES = ['light', 'dark'] as const

export const updateThemeValidator = vine.compile(
  vine.object({
    theme: vine.enum(THEME_PREFERENCES),
  })
)
updateThemeValidator.messagesProvider = messagesProvider
