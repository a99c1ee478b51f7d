import { beforeEach, describe, expect, it } from 'vitest'
import LearningPathGenerator from '#services/learning_path_generator'
import { READING_JOURNEY_TEMPLATE } from '#services/path_template'
import type { PathTemplate } from '#services/path_template'
import InvalidPathTemplateException from '#exceptions/invalid_path_template_exception'
import InMemoryUnitOfWork from '#tests/fakes/in_memory_unit_of_work'

const maya = { id: 1, name: 'Maya', age: 7, readingLevel: 'beginner' }

describe('LearningPathGenerator', () => {
  let unitOfWork: InMemoryUnitOfWork

  beforeEach(() => {
    unitOfWork = new InMemoryUnitOfWork()
    unitOfWork.addProfile(maya)
  })

  function generate(template?: PathTemplate) {
    return unitOfWork.transaction((store) => LearningPathGenerator.generate(maya, store, template))
  }

  it('creates a path on its first stage with no progress', async () => {
    const { path } = await generate()

    expect(path).toMatchObject({
      childProfileId: 1,
      title: 'Personalized Reading Journey for Maya',
      description: 'A customized learning path designed for a 7-year-old reader at beginner level.',
      currentStage: 1,
      totalStages: 5,
      progressPercentage: 0,
    })
    expect(unitOfWork.paths.get(path.id)?.title).toBe('Personalized Reading Journey for Maya')
  })

  it('creates one pending activity per stage, in template order', async () => {
    const { path, activities } = await generate()

    expect(activities.map((activity) => [activity.stageNumber, activity.activityType, activity.title])).toEqual([
      [1, 'assessment', 'Reading Assessment'],
      [2, 'exercise', 'Vocabulary Building'],
      [3, 'reading', 'Guided Reading'],
      [4, 'quiz', 'Comprehension Quiz'],
      [5, 'creative', 'Creative Response'],
    ])
    for (const activity of activities) {
      expect(activity.learningPathId).toBe(path.id)
      expect(activity.status).toBe('pending')
      expect(activity.isCompleted).toBe(false)
      expect(activity.contentUrl).toBeNull()
    }
    expect(unitOfWork.activities.size).toBe(5)
  })

  it('sizes the path after a custom template', async () => {
    const template: PathTemplate = {
      name: 'short-journey',
      title: (profile) => `${profile.name} warms up`,
      description: () => 'Three quick steps',
      stages: READING_JOURNEY_TEMPLATE.stages.slice(1, 4),
    }

    const { path, activities } = await generate(template)

    expect(path.title).toBe('Maya warms up')
    expect(path.totalStages).toBe(3)
    expect(activities.map((activity) => activity.stageNumber)).toEqual([1, 2, 3])
    expect(activities.map((activity) => activity.activityType)).toEqual(['exercise', 'reading', 'quiz'])
  })

  it('rejects an empty template before writing anything', async () => {
    const empty: PathTemplate = { ...READING_JOURNEY_TEMPLATE, name: 'empty', stages: [] }

    await expect(generate(empty)).rejects.toBeInstanceOf(InvalidPathTemplateException)
    await expect(generate(empty)).rejects.toThrow('Path template "empty" has no stages')
    expect(unitOfWork.paths.size).toBe(0)
  })

  it('leaves no path behind when the activities cannot be written', async () => {
    unitOfWork.failOn('createActivities')

    await expect(generate()).rejects.toThrow('createActivities failed')

    expect(unitOfWork.paths.size).toBe(0)
    expect(unitOfWork.activities.size).toBe(0)
    expect(unitOfWork.rollbacks).toBe(1)
  })

  it('keeps earlier paths when generating again', async () => {
    const first = await generate()
    const second = await generate()

    expect(second.path.id).not.toBe(first.path.id)
    expect(unitOfWork.paths.size).toBe(2)
    expect(unitOfWork.activities.size).toBe(10)
    expect(unitOfWork.paths.get(first.path.id)?.currentStage).toBe(1)
  })
})
