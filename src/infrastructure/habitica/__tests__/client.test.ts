import { clientHeaders, createHabiticaClient } from '../client'

describe('habitica client', () => {
    it('should build the authentication headers', () => {
        expect(clientHeaders({ apiUser: 'test-user', apiKey: 'test-secret' })).toEqual({
            'content-type': 'application/json',
            'x-client': 'test-user-PartyUp',
            'x-api-user': 'test-user',
            'x-api-key': 'test-secret',
        })
    })

    it('should configure base url and timeout', () => {
        const client = createHabiticaClient(
            { apiUser: 'test-user', apiKey: 'test-secret' },
            { baseUrl: 'https://habitica.test', timeoutMs: 2500 }
        )

        expect(client.defaults.baseURL).toBe('https://habitica.test')
        expect(client.defaults.timeout).toBe(2500)
    })
})
