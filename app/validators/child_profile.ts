import vine from '@vinejs/vine'
import { messagesProvider } from '#validators/messages'

const name = vine.string().trim().minLength(1).maxLength(100)
const age = vine.number().withoutDecimals().min(0).max(18)
const readingLevel = vine.string().trim().minLength(1).maxLength(20)
const avatarUrl = vine.string().trim().url().maxLength(255)
const interests = vine.array(vine.string().trim().minLength(1).maxLength(50))

export const createChildProfileValidator = vine.compile(
  vine.object({
    name: name.clone(),
    age: age.clone(),
    reading_level: readingLevel.clone(),
    avatar_url: avatarUrl.clone().optional(),
    interests: interests.clone().optional(),
  })
)
createChildProfileValidator.messagesProvider = messagesProvider

/**
 * Every field is optional, only the given ones are changed
 */
export const updateChildProfileValidator = vine.compile(
  vine.object({
    name: name.clone().optional(),
    age: age.clone().optional(),
    reading_level: readingLevel.clone().optional(),
    avatar_url: avatarUrl.clone().nullable().optional(),
    interests: interests.clone().optional(),
  })
)
updateChildProfileValidator.messagesProvider = messagesProvider
