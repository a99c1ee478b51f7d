import InvalidPathTemplateException from '#exceptions/invalid_path_template_exception'
import { READING_JOURNEY_TEMPLATE } from '#services/path_template'
import type { PathTemplate } from '#services/path_template'
import type {
  ChildProfileSnapshot,
  GeneratedLearningPath,
  NewPathActivity,
  PathStore,
} from '#types/learning_paths'

export default class LearningPathGenerator {
  /**
   * Creates a new path for the profile, one pending activity per
   * template stage. Call it inside a unit of work so the path and
   * its activities land together.
   */
  static async generate(
    profile: ChildProfileSnapshot,
    store: PathStore,
    template: PathTemplate = READING_JOURNEY_TEMPLATE
  ): Promise<GeneratedLearningPath> {
    if (template.stages.length === 0) {
      throw new InvalidPathTemplateException(template.name)
    }

    const path = await store.createPath({
      childProfileId: profile.id,
      title: template.title(profile),
      description: template.description(profile),
      currentStage: 1,
      totalStages: template.stages.length,
      progressPercentage: 0,
    })

    const rows = template.stages.map((stage, index): NewPathActivity => ({
      learningPathId: path.id,
      title: stage.title,
      description: stage.description,
      activityType: stage.activityType,
      stageNumber: index + 1,
      status: 'pending',
      isCompleted: false,
    }))

    const activities = await store.createActivities(rows)

    return { path, activities }
  }
}
