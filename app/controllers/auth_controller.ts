import type { HttpContext } from '@adonisjs/core/http'
import User from '#models/user'
import AccountDisabledException from '#exceptions/account_disabled_exception'
import { loginValidator, registerValidator } from '#validators/auth'
import { updateThemeValidator } from '#validators/user_preferences'

export default class AuthController {
  async register({ request, response, auth, logger }: HttpContext) {
    const payload = await request.validateUsing(registerValidator)

    const user = await User.create({
      username: payload.username,
      email: payload.email,
      password: payload.password,
      firstName: payload.first_name,
      lastName: payload.last_name,
      role: payload.role,
      isActive: true,
      themePreference: 'light',
    })

    await auth.use('web').login(user)
    logger.info({ userId: user.id, role: user.role }, 'user registered')

    return response.created({ message: 'User registered successfully', user })
  }

  /**
   * Accepts the username or the email address as `uid`
   */
  async login({ request, response, auth }: HttpContext) {
    const { uid, password } = await request.validateUsing(loginValidator)

    const user = await User.verifyCredentials(uid, password)
    if (!user.isActive) {
      throw new AccountDisabledException()
    }

    await auth.use('web').login(user)
    return response.ok({ message: 'Login successful', user })
  }

  async logout({ auth, response }: HttpContext) {
    await auth.use('web').logout()
    return response.ok({ message: 'Logout successful' })
  }

  async me({ auth, response }: HttpContext) {
    return response.ok({ user: auth.getUserOrFail() })
  }

  async updateTheme({ request, auth, response }: HttpContext) {
    const user = auth.getUserOrFail()
    const { theme } = await request.validateUsing(updateThemeValidator)

    user.themePreference = theme
    await user.save()

    return response.ok({ message: 'Theme preference updated', theme: user.themePreference })
  }
}
