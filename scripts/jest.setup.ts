/**
 * JEST SETUP FILE
 *
 * Runs before each test file. Tests never reach AWS; these placeholders only
 * keep anything that reads process.env from picking up a developer's
 * .env.local values.
 */

process.env.AWS_REGION = 'us-east-1'
process.env.AWS_ACCESS_KEY_ID = 'test-access-key'
process.env.AWS_SECRET_ACCESS_KEY = 'test-secret'
process.env.ATHENA_OUTPUT_LOCATION = 's3://test-bucket/athena-results/'
delete process.env.AWS_PROFILE
