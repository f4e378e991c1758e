/**
 * Response of POST /api/auth
 */
export interface AuthResponse {
    jwt: string;
}
