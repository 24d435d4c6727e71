import { configureLogger, detailsSuffix, logger, redactSensitive } from '../logger'

describe('redactSensitive', () => {
    it('should mask api key headers', () => {
        expect(redactSensitive('x-api-key: 0000aaaa-bbbb-cccc')).toBe('x-api-key: [API_KEY]')
    })

    it('should mask api key pairs', () => {
        expect(redactSensitive('api_key="test-secret-value"')).toBe('api_key="[API_KEY]"')
        expect(redactSensitive('{"apiKey":"test-secret-value"}')).toBe('{"apiKey":"[API_KEY]"}')
    })

    it('should leave other text alone', () => {
        expect(redactSensitive('Found 3 valid users to invite.')).toBe('Found 3 valid users to invite.')
    })
})

describe('detailsSuffix', () => {
    it('should append serialized details', () => {
        expect(detailsSuffix({ details: { message: 'Missing authentication headers.' } })).toBe(
            ' {"message":"Missing authentication headers."}'
        )
    })

    it('should mask keys inside details', () => {
        expect(detailsSuffix({ details: { apiKey: 'test-secret-value' } })).toBe(' {"apiKey":"[API_KEY]"}')
    })

    it('should add nothing without details', () => {
        expect(detailsSuffix({ cycle: 2 })).toBe('')
        expect(detailsSuffix(undefined)).toBe('')
        expect(detailsSuffix({ details: undefined })).toBe('')
    })
})

describe('configureLogger', () => {
    afterEach(() => {
        logger.level = 'info'
    })

    it('should apply the configured level', () => {
        configureLogger({ logLevel: 'debug' })

        expect(logger.level).toBe('debug')
        expect(logger.transports).toHaveLength(1)
    })
})
