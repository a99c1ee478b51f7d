import { BaseSeeder } from '@adonisjs/lucid/seeders'
import User from '#models/user'
import ChildProfile from '#models/child_profile'
import learningPaths from '#services/learning_paths'

export default class extends BaseSeeder {
  static environment = ['development']

  async run() {
    const parent = await User.updateOrCreate(
      { username: 'demo-parent' },
      {
        email: 'parent@example.com',
        password: 'test-secret',
        firstName: 'Demo',
        lastName: 'Parent',
        role: 'parent',
        isActive: true,
        themePreference: 'light',
      }
    )

    const children = [
      { name: 'Maya', age: 7, readingLevel: 'beginner', interests: ['animals', 'space'] },
      { name: 'Leo', age: 10, readingLevel: 'intermediate', interests: ['dinosaurs', 'comics'] },
    ]

    for (const child of children) {
      const existing = await ChildProfile.query()
        .where('userId', parent.id)
        .where('name', child.name)
        .first()
      if (existing) continue

      const profile = await ChildProfile.create({ userId: parent.id, avatarUrl: null, ...child })
      await learningPaths.generateLearningPath(profile)
    }
  }
}
