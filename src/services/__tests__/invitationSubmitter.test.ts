import MockAdapter from 'axios-mock-adapter'
import { createHabiticaClient, PARTY_INVITE_PATH } from '../../infrastructure/habitica/client'
import { TransportError } from '../../shared/utils/errors'
import { submitInvitations } from '../invitationSubmitter'

jest.mock('../../shared/utils/logger', () => {
    const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }
    return { __esModule: true, logger: mockLogger, default: mockLogger, withCycleContext: jest.fn(() => mockLogger) }
})

describe('submitInvitations', () => {
    const client = createHabiticaClient(
        { apiUser: 'test-user', apiKey: 'test-secret' },
        { baseUrl: 'https://habitica.test', timeoutMs: 1000 }
    )
    const log = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }
    let mockAxios: MockAdapter

    beforeEach(() => {
        mockAxios = new MockAdapter(client)
    })

    afterEach(() => {
        mockAxios.restore()
        jest.clearAllMocks()
    })

    it('should not send anything for an empty batch', async () => {
        await expect(submitInvitations(client, [], log)).resolves.toBe(0)

        expect(mockAxios.history.post).toHaveLength(0)
        expect(log.info).toHaveBeenCalledWith('No users to invite at this time.')
    })

    it('should post the whole batch in one request', async () => {
        mockAxios.onPost(PARTY_INVITE_PATH).reply(200, { success: true, data: [] })

        await expect(submitInvitations(client, ['u1', 'u2'], log)).resolves.toBe(2)

        expect(mockAxios.history.post).toHaveLength(1)
        expect(JSON.parse(mockAxios.history.post[0].data)).toEqual({ uuids: ['u1', 'u2'] })
        expect(log.info).toHaveBeenCalledWith('Successfully invited 2 users!')
    })

    it('should not interpret the body of a successful response', async () => {
        mockAxios.onPost(PARTY_INVITE_PATH).reply(200, 'partially invited')

        await expect(submitInvitations(client, ['u1'], log)).resolves.toBe(1)
    })

    it('should count a rejected invite as sent and not end the run', async () => {
        mockAxios.onPost(PARTY_INVITE_PATH).reply(401, { success: false, message: 'User already invited' })

        await expect(submitInvitations(client, ['u1'], log)).resolves.toBe(1)
        expect(log.info).toHaveBeenCalledWith('Successfully invited 1 users!')
    })

    it('should wrap network failures', async () => {
        mockAxios.onPost(PARTY_INVITE_PATH).networkError()

        await expect(submitInvitations(client, ['u1'], log)).rejects.toBeInstanceOf(TransportError)
    })
})
