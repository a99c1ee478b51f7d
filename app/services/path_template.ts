import type { ActivityType, ChildProfileSnapshot } from '#types/learning_paths'

export interface PathTemplateStage {
  activityType: ActivityType
  title: string
  description: string
}

/**
 * Ordered blueprint of a learning path. Stage `n` of the generated
 * path receives `stages[n - 1]`.
 */
export interface PathTemplate {
  name: string
  title(profile: ChildProfileSnapshot): string
  description(profile: ChildProfileSnapshot): string
  stages: readonly PathTemplateStage[]
}

/**
 * Default curriculum. The order is the order children work through it.
 */
export const READING_JOURNEY_TEMPLATE: PathTemplate = {
  name: 'reading-journey',
  title: (profile) => `Personalized Reading Journey for ${profile.name}`,
  description: (profile) =>
    `A customized learning path designed for a ${profile.age}-year-old reader at ${profile.readingLevel} level.`,
  stages: [
    {
      activityType: 'assessment',
      title: 'Reading Assessment',
      description:
        'Complete an initial reading assessment to identify your strengths and areas for improvement.',
    },
    {
      activityType: 'exercise',
      title: 'Vocabulary Building',
      description: 'Practice with new words to expand your vocabulary.',
    },
    {
      activityType: 'reading',
      title: 'Guided Reading',
      description: 'Read a story with interactive guidance to help with comprehension.',
    },
    {
      activityType: 'quiz',
      title: 'Comprehension Quiz',
      description: 'Answer questions about the story to check your understanding.',
    },
    {
      activityType: 'creative',
      title: 'Creative Response',
      description: 'Create your own story or drawing inspired by what you read.',
    },
  ],
}
