import { defineConfig } from '@adonisjs/cors'

/**
 * The reading app front end is served from another origin and
 * sends the session cookie along, hence "credentials"
 */
const corsConfig = defineConfig({
  enabled: true,
  origin: true,
  methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE'],
  headers: true,
  exposeHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset'],
  credentials: true,
  maxAge: 90,
})

export default corsConfig
