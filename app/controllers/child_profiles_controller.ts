import type { HttpContext } from '@adonisjs/core/http'
import ChildProfile from '#models/child_profile'
import learningPaths from '#services/learning_paths'
import {
  createChildProfileValidator,
  updateChildProfileValidator,
} from '#validators/child_profile'

export default class ChildProfilesController {
  async index({ auth, response }: HttpContext) {
    const user = auth.getUserOrFail()
    const profiles = await ChildProfile.query().where('userId', user.id).orderBy('id', 'asc')

    return response.json({ profiles })
  }

  async show({ params, auth, response }: HttpContext) {
    const profile = await ChildProfile.findOwnedOrFail(params.id, auth.getUserOrFail())
    return response.json(profile)
  }

  /**
   * Creates the profile, then its first learning path
   */
  async store({ request, auth, response, logger }: HttpContext) {
    const user = auth.getUserOrFail()
    const payload = await request.validateUsing(createChildProfileValidator)

    const profile = await ChildProfile.create({
      userId: user.id,
      name: payload.name,
      age: payload.age,
      readingLevel: payload.reading_level,
      avatarUrl: payload.avatar_url ?? null,
      interests: payload.interests ?? [],
    })

    const { path } = await learningPaths.generateLearningPath(profile)
    logger.info({ childProfileId: profile.id, learningPathId: path.id }, 'learning path generated')

    return response.created({
      message: 'Child profile created successfully',
      profile,
      learning_path: path,
    })
  }

  async update({ params, request, auth, response }: HttpContext) {
    const profile = await ChildProfile.findOwnedOrFail(params.id, auth.getUserOrFail())
    const payload = await request.validateUsing(updateChildProfileValidator)

    if (payload.name !== undefined) profile.name = payload.name
    if (payload.age !== undefined) profile.age = payload.age
    if (payload.reading_level !== undefined) profile.readingLevel = payload.reading_level
    if (payload.avatar_url !== undefined) profile.avatarUrl = payload.avatar_url
    if (payload.interests !== undefined) profile.interests = payload.interests

    await profile.save()

    return response.ok({ message: 'Child profile updated successfully', profile })
  }

  /**
   * Paths, activities and assessments go with the profile
   */
  async destroy({ params, auth, response }: HttpContext) {
    const profile = await ChildProfile.findOwnedOrFail(params.id, auth.getUserOrFail())
    await profile.delete()

    return response.ok({ message: 'Child profile deleted successfully' })
  }
}
