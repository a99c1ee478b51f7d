import { SimpleMessagesProvider } from '@vinejs/vine'

/**
 * Messages shared by every validator of the API. Keys are either
 * `rule` or `field.rule`.
 */
export const messagesProvider = new SimpleMessagesProvider(
  {
    'required': 'The {{ field }} field is required',
    'string': 'The {{ field }} field must be a string',
    'number': 'The {{ field }} field must be a number',
    'withoutDecimals': 'The {{ field }} field must be a whole number',
    'min': 'The {{ field }} field must be at least {{ min }}',
    'max': 'The {{ field }} field must not be greater than {{ max }}',
    'minLength': 'The {{ field }} field must have at least {{ min }} characters',
    'maxLength': 'The {{ field }} field must not be longer than {{ max }} characters',
    'email': 'The {{ field }} field must be a valid email address',
    'url': 'The {{ field }} field must be a valid URL',
    'enum': 'The selected {{ field }} is invalid',
    'theme.required': 'Invalid theme preference',
    'theme.enum': 'Invalid theme preference',
    'database.unique': 'The {{ field }} has already been taken',
    'username.database.unique': 'Username already exists',
    'email.database.unique': 'Email already exists',
  },
  {
    first_name: 'first name',
    last_name: 'last name',
    reading_level: 'reading level',
    avatar_url: 'avatar URL',
    child_profile_id: 'child profile',
  }
)
