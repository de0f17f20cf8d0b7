/**
 * Users API
 * Current user's profile
 */

import type { HttpClient } from '../client/HttpClient.js';
import type { UserProfile } from '../types/spotify.js';

export class UsersApi {
    constructor(private readonly http: HttpClient) { }

    async getMe(): Promise<UserProfile> {
        return this.http.get<UserProfile>('/me');
    }
}
