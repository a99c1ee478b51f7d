import type { HttpContext } from '@adonisjs/core/http'
import ChildProfile from '#models/child_profile'
import PathActivity from '#models/path_activity'
import learningPaths from '#services/learning_paths'
import { updateActivityStatusValidator } from '#validators/learning_path'

export default class LearningPathsController {
  /**
   * Every path of a profile, activities ordered by stage
   */
  async index({ params, auth, response }: HttpContext) {
    const profile = await ChildProfile.findOwnedOrFail(params.profileId, auth.getUserOrFail())
    const paths = await learningPaths.listPathsForProfile(profile.id)

    return response.json({ learning_paths: paths })
  }

  async updateActivity({ params, request, auth, response, logger }: HttpContext) {
    const activity = await PathActivity.findOwnedOrFail(params.id, auth.getUserOrFail())
    const { status } = await request.validateUsing(updateActivityStatusValidator)

    const result = await learningPaths.applyActivityStatus(activity.id, status)

    if (result.stageAdvanced) {
      logger.info(
        {
          learningPathId: result.path.id,
          currentStage: result.path.currentStage,
          progressPercentage: result.path.progressPercentage,
        },
        'learning path advanced'
      )
    }

    return response.ok({
      message: 'Activity updated',
      activity: result.activity,
      learning_path: result.path,
    })
  }
}
