import { AppError, ConfigurationError, ProtocolError, TransportError, handleError } from '../errors'

jest.mock('../logger', () => {
    const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }
    return { __esModule: true, logger: mockLogger, default: mockLogger, withCycleContext: jest.fn(() => mockLogger) }
})

describe('errors', () => {
    it('should tag each category', () => {
        expect(new ConfigurationError().code).toBe('CONFIGURATION')
        expect(new TransportError().code).toBe('TRANSPORT')
        expect(new ProtocolError('bad body', { field: 'data' })).toMatchObject({
            name: 'ProtocolError',
            code: 'PROTOCOL',
            exitCode: 1,
            details: { field: 'data' },
        })
    })

    it('should pass app errors through', () => {
        const error = new TransportError('down')
        expect(handleError(error)).toBe(error)
    })

    it('should wrap unknown errors as non-operational', () => {
        const wrapped = handleError(new Error('kaboom'))
        expect(wrapped).toBeInstanceOf(AppError)
        expect(wrapped).toMatchObject({ message: 'kaboom', code: 'INTERNAL', isOperational: false })

        expect(handleError('nope').message).toBe('An unexpected error occurred')
    })
})
