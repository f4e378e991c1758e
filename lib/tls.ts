import { promises as fsPromises } from 'node:fs';
import * as path from 'node:path';
import type { SecureContextOptions } from 'node:tls';
import { getErrorMessage, isFileNotFoundError } from './util.js';

async function readOptional(file: string): Promise<Buffer | undefined> {
    try {
        return await fsPromises.readFile(file);
    } catch (error) {
        if (isFileNotFoundError(error)) {
            return undefined;
        }
        throw error;
    }
}

/**
 * TLS certificate utilities for HTTPS connections to Portainer
 */
export class TLS {
    /**
     * Load TLS certificates from a directory
     * @param certPath Path to directory containing ca.pem, cert.pem, and key.pem files, each optional
     */
    static async loadCertificates(
        certPath: string,
    ): Promise<SecureContextOptions> {
        const tlsOptions: SecureContextOptions = {};

        try {
            const ca = await readOptional(path.join(certPath, 'ca.pem'));
            if (ca) {
                tlsOptions.ca = ca;
            }

            const cert = await readOptional(path.join(certPath, 'cert.pem'));
            if (cert) {
                tlsOptions.cert = cert;
            }

            const key = await readOptional(path.join(certPath, 'key.pem'));
            if (key) {
                tlsOptions.key = key;
            }

            return tlsOptions;
        } catch (error) {
            throw new Error(
                `Failed to load TLS certificates from ${certPath}: ${getErrorMessage(error)}`,
            );
        }
    }
}
