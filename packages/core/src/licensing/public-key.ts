/**
 * Embedded license-signing public key (raw 32-byte Ed25519, base64).
 *
 * The matching private key only exists in the license signing service.
 */
export const EMBEDDED_PUBLIC_KEY = 'CMrpSqVHoD4JS4TW8EsVOUFdivhklj3tVno9IktFBd8=';
