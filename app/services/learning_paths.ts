import LearningPathService from '#services/learning_path_service'
import LucidUnitOfWork from '#services/lucid_unit_of_work'

/**
 * Instance shared by controllers, seeders and commands. Activity
 * updates are only serialized between callers of the same instance.
 */
const learningPaths = new LearningPathService(new LucidUnitOfWork())

export default learningPaths
