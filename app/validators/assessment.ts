import vine from '@vinejs/vine'
import { messagesProvider } from '#validators/messages'

const score = vine.number().withoutDecimals().min(0).max(100)

export const createAssessmentValidator = vine.compile(
  vine.object({
    child_profile_id: vine.number().withoutDecimals().positive(),
    reading_level: vine.string().trim().minLength(1).maxLength(20),
    reading_fluency_score: score.clone().optional(),
    comprehension_score: score.clone().optional(),
    vocabulary_score: score.clone().optional(),
    notes: vine.string().trim().maxLength(2000).optional(),
  })
)
createAssessmentValidator.messagesProvider = messagesProvider
