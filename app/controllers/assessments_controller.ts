import type { HttpContext } from '@adonisjs/core/http'
import db from '@adonisjs/lucid/services/db'
import ChildProfile from '#models/child_profile'
import ProgressAssessment from '#models/progress_assessment'
import learningPaths from '#services/learning_paths'
import { createAssessmentValidator } from '#validators/assessment'

export default class AssessmentsController {
  async index({ params, auth, response }: HttpContext) {
    const profile = await ChildProfile.findOwnedOrFail(params.profileId, auth.getUserOrFail())
    const assessments = await ProgressAssessment.query()
      .where('childProfileId', profile.id)
      .orderBy('assessmentDate', 'desc')

    return response.json({ assessments })
  }

  /**
   * Records the assessment and the new reading level, then generates
   * an additional learning path. Earlier paths are kept as they are.
   */
  async store({ request, auth, response, logger }: HttpContext) {
    const payload = await request.validateUsing(createAssessmentValidator)
    const profile = await ChildProfile.findOwnedOrFail(payload.child_profile_id, auth.getUserOrFail())

    const assessment = await db.transaction(async (trx) => {
      profile.useTransaction(trx)
      profile.readingLevel = payload.reading_level
      await profile.save()

      return ProgressAssessment.create(
        {
          childProfileId: profile.id,
          readingLevel: payload.reading_level,
          readingFluencyScore: payload.reading_fluency_score ?? null,
          comprehensionScore: payload.comprehension_score ?? null,
          vocabularyScore: payload.vocabulary_score ?? null,
          notes: payload.notes ?? null,
        },
        { client: trx }
      )
    })

    const { path } = await learningPaths.generateForProfile(profile.id)
    logger.info(
      { childProfileId: profile.id, assessmentId: assessment.id, learningPathId: path.id },
      'learning path generated after assessment'
    )

    return response.created({
      message: 'Assessment created successfully',
      assessment,
      learning_path: path,
    })
  }
}
