import { args, BaseCommand } from '@adonisjs/core/ace'
import type { CommandOptions } from '@adonisjs/core/types/ace'
import ChildProfile from '#models/child_profile'
import learningPaths from '#services/learning_paths'

export default class DumpPaths extends BaseCommand {
  static commandName = 'paths:dump'
  static description = 'Print the learning paths of a child profile with their activities'
  static options: CommandOptions = { startApp: true }

  @args.string({ description: 'Id of the child profile' })
  declare profileId: string

  async run() {
    const profileId = Number(this.profileId)
    if (!Number.isInteger(profileId) || profileId <= 0) {
      this.logger.error(`"${this.profileId}" is not a valid profile id`)
      this.exitCode = 1
      return
    }

    const profile = await ChildProfile.find(profileId)
    if (!profile) {
      this.logger.error(`Cannot find child profile with id ${profileId}`)
      this.exitCode = 1
      return
    }

    const paths = await learningPaths.listPathsForProfile(profile.id)
    if (paths.length === 0) {
      this.logger.warning(`${profile.name} has no learning path yet`)
      return
    }

    for (const { path, activities } of paths) {
      this.logger.info(
        `#${path.id} ${path.title}: stage ${path.currentStage}/${path.totalStages}, ${path.progressPercentage}%`
      )

      const table = this.ui.table()
      table.head(['Stage', 'Type', 'Title', 'Status', 'Completed'])
      for (const activity of activities) {
        table.row([
          String(activity.stageNumber),
          activity.activityType,
          activity.title,
          activity.status,
          activity.isCompleted ? 'yes' : 'no',
        ])
      }
      table.render()
    }
  }
}
