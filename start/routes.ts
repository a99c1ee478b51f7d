/*
|--------------------------------------------------------------------------
| Routes file
|--------------------------------------------------------------------------
|
| The routes file is used for defining the HTTP routes.
|
*/

import router from '@adonisjs/core/services/router'
import { middleware } from '#start/kernel'

const AuthController = () => import('#controllers/auth_controller')
const ChildProfilesController = () => import('#controllers/child_profiles_controller')
const LearningPathsController = () => import('#controllers/learning_paths_controller')
const AssessmentsController = () => import('#controllers/assessments_controller')

router
  .group(() => {
    router.post('/register', [AuthController, 'register'])
    router.post('/login', [AuthController, 'login']).use(middleware.rateLimit({ maxRequests: 10 }))
    router.post('/logout', [AuthController, 'logout']).use(middleware.auth())
    router.get('/user', [AuthController, 'me']).use(middleware.auth())
    router.post('/update-theme', [AuthController, 'updateTheme']).use(middleware.auth())
  })
  .prefix('/api/auth')

router
  .group(() => {
    router.get('/child-profiles', [ChildProfilesController, 'index'])
    router.get('/child-profiles/:id', [ChildProfilesController, 'show'])
    router.post('/child-profiles', [ChildProfilesController, 'store'])
    router.put('/child-profiles/:id', [ChildProfilesController, 'update'])
    router.delete('/child-profiles/:id', [ChildProfilesController, 'destroy'])

    router.get('/learning-paths/:profileId', [LearningPathsController, 'index'])
    router.put('/learning-paths/activities/:id', [LearningPathsController, 'updateActivity'])

    router.get('/assessments/:profileId', [AssessmentsController, 'index'])
    router.post('/assessments', [AssessmentsController, 'store'])
  })
  .prefix('/api')
  .where('id', router.matchers.number())
  .where('profileId', router.matchers.number())
  .use(middleware.auth())
