import { describe, expect, it } from 'vitest'
import { errors } from '@vinejs/vine'
import {
  createChildProfileValidator,
  updateChildProfileValidator,
} from '#validators/child_profile'
import { createAssessmentValidator } from '#validators/assessment'
import { updateActivityStatusValidator } from '#validators/learning_path'
import { updateThemeValidator } from '#validators/user_preferences'

describe('child profile validators', () => {
  it('accepts a new profile and trims its text fields', async () => {
    const payload = await createChildProfileValidator.validate({
      name: '  Maya ',
      age: 7,
      reading_level: 'beginner',
      interests: [' space ', 'animals'],
    })

    expect(payload).toEqual({
      name: 'Maya',
      age: 7,
      reading_level: 'beginner',
      interests: ['space', 'animals'],
    })
  })

  it('reports a missing reading level with its label', async () => {
    await expect(createChildProfileValidator.validate({ name: 'Maya', age: 7 })).rejects.toMatchObject({
      messages: [
        {
          field: 'reading_level',
          rule: 'required',
          message: 'The reading level field is required',
        },
      ],
    })
  })

  it('rejects an age above 18', async () => {
    const validation = createChildProfileValidator.validate({
      name: 'Maya',
      age: 19,
      reading_level: 'beginner',
    })

    await expect(validation).rejects.toBeInstanceOf(errors.E_VALIDATION_ERROR)
    await expect(validation).rejects.toMatchObject({
      messages: [{ field: 'age', rule: 'max', message: 'The age field must not be greater than 18' }],
    })
  })

  it('rejects a fractional age', async () => {
    await expect(
      createChildProfileValidator.validate({ name: 'Maya', age: 7.5, reading_level: 'beginner' })
    ).rejects.toMatchObject({
      messages: [{ field: 'age', rule: 'withoutDecimals', message: 'The age field must be a whole number' }],
    })
  })

  it('lets an update clear the avatar and skip every other field', async () => {
    const payload = await updateChildProfileValidator.validate({ avatar_url: null })

    expect(payload).toEqual({ avatar_url: null })
  })
})

describe('createAssessmentValidator', () => {
  it('accepts scores between 0 and 100', async () => {
    const payload = await createAssessmentValidator.validate({
      child_profile_id: 3,
      reading_level: 'intermediate',
      reading_fluency_score: 0,
      comprehension_score: 100,
      notes: ' Reads aloud with confidence ',
    })

    expect(payload).toEqual({
      child_profile_id: 3,
      reading_level: 'intermediate',
      reading_fluency_score: 0,
      comprehension_score: 100,
      notes: 'Reads aloud with confidence',
    })
  })

  it('rejects a score above 100', async () => {
    await expect(
      createAssessmentValidator.validate({
        child_profile_id: 3,
        reading_level: 'intermediate',
        vocabulary_score: 120,
      })
    ).rejects.toMatchObject({
      messages: [
        {
          field: 'vocabulary_score',
          rule: 'max',
          message: 'The vocabulary_score field must not be greater than 100',
        },
      ],
    })
  })
})

describe('updateActivityStatusValidator', () => {
  it('trims the status and leaves its value to the progress tracker', async () => {
    await expect(updateActivityStatusValidator.validate({ status: ' completed ' })).resolves.toEqual({
      status: 'completed',
    })
    await expect(updateActivityStatusValidator.validate({ status: 'done' })).resolves.toEqual({
      status: 'done',
    })
  })

  it('requires a status', async () => {
    await expect(updateActivityStatusValidator.validate({})).rejects.toMatchObject({
      messages: [{ field: 'status', rule: 'required', message: 'The status field is required' }],
    })
  })
})

describe('updateThemeValidator', () => {
  it.each(['light', 'dark'])('accepts the %s theme', async (theme) => {
    await expect(updateThemeValidator.validate({ theme })).resolves.toEqual({ theme })
  })

  it('rejects any other theme', async () => {
    await expect(updateThemeValidator.validate({ theme: 'blue' })).rejects.toMatchObject({
      messages: [{ field: 'theme', rule: 'enum', message: 'Invalid theme preference' }],
    })
  })

  it('rejects a payload without a theme', async () => {
    await expect(updateThemeValidator.validate({})).rejects.toMatchObject({
      messages: [{ field: 'theme', rule: 'required', message: 'Invalid theme preference' }],
    })
  })
})
