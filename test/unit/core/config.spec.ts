import * as assert from 'assert'
import { getDefaultOptionsConfig } from '../../../src/core/config'
import { ConfigurationError, ErrorEnvironment } from '../../../src/core/errors/taxonomy'

describe('getDefaultOptionsConfig', () => {
    it('should be strict and log at info in production', () => {
        assert.deepStrictEqual(getDefaultOptionsConfig({ NODE_ENV: 'production' }), {
            environment: ErrorEnvironment.PRODUCTION,
            logLevel: 'info',
            validationMode: 'strict',
        })
    })

    it('should be silent under test', () => {
        assert.deepStrictEqual(getDefaultOptionsConfig({ NODE_ENV: 'test' }), {
            environment: ErrorEnvironment.TEST,
            logLevel: 'silent',
            validationMode: 'lenient',
        })
    })

    it('should default to lenient development settings', () => {
        assert.deepStrictEqual(getDefaultOptionsConfig({}), {
            environment: ErrorEnvironment.DEVELOPMENT,
            logLevel: 'debug',
            validationMode: 'lenient',
        })
    })

    it('should honor explicit overrides', () => {
        const config = getDefaultOptionsConfig({
            NODE_ENV: 'production',
            LOG_LEVEL: 'warn',
            PROVISIONING_VALIDATION_MODE: 'lenient',
        })
        assert.strictEqual(config.logLevel, 'warn')
        assert.strictEqual(config.validationMode, 'lenient')
    })

    it('should reject unsupported values', () => {
        assert.throws(
            () => getDefaultOptionsConfig({ LOG_LEVEL: 'loud' }),
            (error: unknown) => error instanceof ConfigurationError && error.code === 'CONFIG_ENV_INVALID'
        )
    })
})
