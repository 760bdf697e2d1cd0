/**
 * OpenID 2.0 Associations - Default Association Service
 *
 * Establishes associations, signs positive assertions, builds negative
 * assertions and answers check_authentication.
 *
 * Association Kinds:
 * - Shared: established by the relying party via `openid.mode=associate`,
 *   used to sign assertions that name its handle
 * - Private: created here when the relying party sent no usable handle
 *   (stateless mode); only these verify through check_authentication
 *
 * Verification is idempotent: a private association is not consumed by
 * check_authentication, so repeating a request repeats the answer.
 *
 * @module openid2_association/association-service
 * @see https://openid.net/specs/openid-authentication-2_0.html#associations
 * @see https://openid.net/specs/openid-authentication-2_0.html#verification
 */

import {
    AssociationTypes,
    ErrorMessages,
    MessageError,
    OpenIdErrors,
    OpenIdMessage,
    REQUIRED_SIGNED_FIELDS,
    RequestModes,
    ResponseModes,
    SessionTypes,
    generateAssociationHandle,
    generateMacKey,
    generateResponseNonce,
    signKeyValue,
    signaturesMatch,
} from '@openid-provider/shared';
import { keyTransportFields, macAlgorithmOf, negotiate, readKeyTransport } from './diffie-hellman';
import type {
    AssociationRecord,
    AssociationService,
    AssociationServiceConfig,
    AssociationStore,
    AssociationType,
    ParameterList,
} from './types';

/** Type of the private associations created for stateless relying parties */
const PRIVATE_ASSOCIATION_TYPE: AssociationType = AssociationTypes.HMAC_SHA256;

export class DefaultAssociationService implements AssociationService {
    constructor(
        private readonly store: AssociationStore,
        private readonly config: AssociationServiceConfig,
        private readonly clock: () => Date = () => new Date()
    ) {}

    // -------------------------------------------------------------------------
    // associate
    // -------------------------------------------------------------------------

    /**
     * Establish a shared association.
     *
     * An unsupported assoc_type / session_type pair is answered with the
     * `unsupported-type` error message, which names the preferred pair so the
     * relying party can retry.
     *
     * @throws MessageError on missing or malformed Diffie-Hellman parameters
     * @see OpenID 2.0 Section 8.2
     */
    async associationResponse(params: ParameterList): Promise<OpenIdMessage> {
        const request = OpenIdMessage.fromParameters(params);
        const sessionType = request.get('session_type') || SessionTypes.NO_ENCRYPTION;
        const negotiation = negotiate(request.get('assoc_type'), sessionType);
        if (!negotiation.supported) {
            return OpenIdMessage.create()
                .set('error', ErrorMessages.UNSUPPORTED_ASSOCIATION)
                .set('error_code', OpenIdErrors.UNSUPPORTED_TYPE)
                .set('session_type', SessionTypes.DH_SHA256)
                .set('assoc_type', AssociationTypes.HMAC_SHA256);
        }

        const transport = readKeyTransport(request, sessionType);
        const macKey = generateMacKey(negotiation.macAlgorithm);
        const keyFields = keyTransportFields(transport, macKey);

        const association = await this.createAssociation(negotiation.assocType, macKey, false);

        const response = OpenIdMessage.create()
            .set('assoc_handle', association.handle)
            .set('session_type', sessionType)
            .set('assoc_type', association.type)
            .set('expires_in', String(this.config.associationLifetimeSeconds));
        for (const [key, value] of Object.entries(keyFields)) {
            response.set(key, value);
        }
        return response;
    }

    // -------------------------------------------------------------------------
    // checkid responses
    // -------------------------------------------------------------------------

    /**
     * Build the response to a checkid request.
     *
     * @throws MessageError when the request has no return_to
     * @see OpenID 2.0 Section 10
     */
    async authResponse(
        params: ParameterList,
        claimedId: string,
        localId: string,
        authenticatedAndApproved: boolean
    ): Promise<OpenIdMessage> {
        const request = OpenIdMessage.fromParameters(params);
        const returnTo = request.get('return_to');
        if (!returnTo) {
            throw new MessageError(ErrorMessages.MISSING_RETURN_TO);
        }

        if (!authenticatedAndApproved) {
            const mode = request.get('mode') === RequestModes.CHECKID_IMMEDIATE
                ? ResponseModes.SETUP_NEEDED
                : ResponseModes.CANCEL;
            return OpenIdMessage.create().set('mode', mode).setDestination(returnTo);
        }

        const requestedHandle = request.get('assoc_handle');
        const shared = requestedHandle ? await this.findUsable(requestedHandle, false) : null;
        const association = shared ?? await this.createAssociation(
            PRIVATE_ASSOCIATION_TYPE,
            generateMacKey(macAlgorithmOf(PRIVATE_ASSOCIATION_TYPE)),
            true
        );

        const response = OpenIdMessage.create()
            .set('mode', ResponseModes.ID_RES)
            .set('op_endpoint', this.config.opEndpointUrl)
            .set('claimed_id', claimedId)
            .set('identity', localId)
            .set('return_to', returnTo)
            .set('response_nonce', generateResponseNonce(this.clock()))
            .set('assoc_handle', association.handle);
        if (requestedHandle && !shared) {
            response.set('invalidate_handle', requestedHandle);
        }

        this.signWith(response, [...REQUIRED_SIGNED_FIELDS, 'claimed_id', 'identity'], association);
        return response;
    }

    /**
     * Extend the signature of a positive assertion to fields attached after
     * it was built.
     *
     * @throws MessageError when the assertion's association is gone
     */
    async sign(message: OpenIdMessage, additionalKeys: readonly string[]): Promise<OpenIdMessage> {
        const handle = message.get('assoc_handle');
        const association = handle ? await this.store.get(handle) : null;
        if (!association) {
            throw new MessageError(ErrorMessages.UNKNOWN_ASSOCIATION);
        }

        const signed = (message.get('signed') ?? '').split(',').filter(Boolean);
        for (const key of additionalKeys) {
            if (!signed.includes(key)) {
                signed.push(key);
            }
        }

        this.signWith(message, signed, association);
        return message;
    }

    // -------------------------------------------------------------------------
    // check_authentication
    // -------------------------------------------------------------------------

    /**
     * Verify an assertion for a stateless relying party.
     *
     * The signature is recomputed over the signed fields with mode set back
     * to id_res, using private associations only.
     *
     * @throws MessageError when the request is missing its signature
     * @see OpenID 2.0 Section 11.4.2
     */
    async verify(params: ParameterList): Promise<OpenIdMessage> {
        const request = OpenIdMessage.fromParameters(params);
        const handle = request.get('assoc_handle');
        const signed = request.get('signed');
        const sig = request.get('sig');
        if (!handle || !signed || !sig) {
            throw new MessageError(ErrorMessages.MISSING_SIGNATURE);
        }

        let valid = false;
        const association = await this.findUsable(handle, true);
        if (association) {
            request.set('mode', ResponseModes.ID_RES);
            const signedKeys = signed.split(',');
            for (const key of signedKeys) {
                if (!request.has(key)) {
                    throw new MessageError(ErrorMessages.MISSING_SIGNED_FIELD + key);
                }
            }
            const expected = signKeyValue(
                request.toKeyValueForm(signedKeys),
                Buffer.from(association.macKey, 'base64'),
                macAlgorithmOf(association.type)
            );
            valid = signaturesMatch(expected, sig);
        }

        const response = OpenIdMessage.create().set('is_valid', valid ? 'true' : 'false');

        const invalidateHandle = request.get('invalidate_handle');
        if (invalidateHandle && !(await this.findUsable(invalidateHandle, false))) {
            response.set('invalidate_handle', invalidateHandle);
        }
        return response;
    }

    // -------------------------------------------------------------------------
    // Internals
    // -------------------------------------------------------------------------

    private async createAssociation(
        type: AssociationType,
        macKey: Buffer,
        isPrivate: boolean
    ): Promise<AssociationRecord> {
        const expiresAt = new Date(this.clock().getTime() + this.config.associationLifetimeSeconds * 1000);
        const association: AssociationRecord = {
            handle: generateAssociationHandle(),
            type,
            macKey: macKey.toString('base64'),
            private: isPrivate,
            expiresAt: expiresAt.toISOString(),
        };
        await this.store.save(association);
        return association;
    }

    /**
     * Unexpired association of the requested kind, or null. An expired one
     * is removed from the store.
     */
    private async findUsable(handle: string, isPrivate: boolean): Promise<AssociationRecord | null> {
        const association = await this.store.get(handle);
        if (!association) {
            return null;
        }
        if (new Date(association.expiresAt).getTime() <= this.clock().getTime()) {
            await this.store.remove(handle);
            return null;
        }
        return association.private === isPrivate ? association : null;
    }

    private signWith(message: OpenIdMessage, keys: readonly string[], association: AssociationRecord): void {
        message.set('signed', keys.join(','));
        message.set('sig', signKeyValue(
            message.toKeyValueForm(keys),
            Buffer.from(association.macKey, 'base64'),
            macAlgorithmOf(association.type)
        ));
    }
}
