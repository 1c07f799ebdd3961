import { KeywordLibrary, SchemaValidationError } from '~/index';

const library = new KeywordLibrary();

// Example schema
const userSchema = {
  type: 'object',
  required: ['username', 'email', 'age'],
  properties: {
    username: {
      type: 'string',
      minLength: 3,
      maxLength: 20
    },
    email: {
      type: 'string',
      format: 'email'
    },
    age: {
      type: 'integer',
      minimum: 18
    }
  }
};

const validateUser = (userData: string) => {
  try {
    library.validateJsonschema(userData, userSchema);
    return { valid: true, errors: [] };
  } catch (err) {
    if (!(err instanceof SchemaValidationError)) throw err;

    return {
      valid: false,
      errors: err.errors.map(e => ({ message: e.message, path: e.instancePath }))
    };
  }
};

// Example usage:
const validUser = '{"username":"johndoe","email":"john@example.com","age":25}';
const invalidUser = '{"username":"j","email":"not-an-email","age":16}';

console.log(validateUser(validUser));
// Returns: { valid: true, errors: [] }

console.log(validateUser(invalidUser));
// Returns: {
//   valid: false,
//   errors: [
//     { message: 'must NOT have fewer than 3 characters', path: '/username' },
//     { message: 'must match format "email"', path: '/email' },
//     { message: 'must be >= 18', path: '/age' }
//   ]
// }
