/**
 * OpenID 2.0 Provider - Attribute Exchange Responder
 *
 * Answers AX fetch requests with the attributes this provider knows about.
 * The directory only gives us the user id and mail address, and both follow
 * from the identity the user already approved, so no separate consent is
 * asked for them.
 *
 * Recognized type URIs:
 *
 * | Type URI                                  | Source         |
 * |-------------------------------------------|----------------|
 * | http://axschema.org/contact/email         | email          |
 * | http://schema.openid.net/contact/email    | email          |
 * | http://axschema.org/namePerson/friendly   | userIdentifier |
 *
 * Anything else is left out of the response.
 *
 * @module openid2_provider/attribute-exchange
 * @see https://openid.net/specs/openid-attribute-exchange-1_0.html
 */

import { AX_NS, AX_RESPONSE_ALIAS, AxTypes, type OpenIdMessage } from '@openid-provider/shared';
import type { AuthenticatedProfile } from './types';

// =============================================================================
// Types
// =============================================================================

/** Requested attributes, alias → type URI, in request order */
export type FetchRequest = {
    readonly kind: 'fetch';
    readonly attributes: ReadonlyMap<string, string>;
};

/**
 * AX content of a request. `unknown` covers AX messages other than a
 * fetch request (store requests, malformed modes); they get no response.
 */
export type AxRequest =
    | FetchRequest
    | { readonly kind: 'none' }
    | { readonly kind: 'unknown'; readonly mode?: string };

export interface AttributeValue {
    readonly alias: string;
    readonly typeUri: string;
    readonly value: string;
}

export type AttributeResponse = readonly AttributeValue[];

const FETCH_REQUEST = 'fetch_request';
const FETCH_RESPONSE = 'fetch_response';
const TYPE_PREFIX = 'type.';

const SOURCES: Readonly<Record<string, (profile: AuthenticatedProfile) => string>> = {
    [AxTypes.EMAIL]: profile => profile.email,
    [AxTypes.EMAIL_LEGACY]: profile => profile.email,
    [AxTypes.FRIENDLY_NAME]: profile => profile.userIdentifier,
};

// =============================================================================
// Request Parsing
// =============================================================================

/**
 * Read the AX extension of a checkid request, under whatever alias the
 * relying party declared it.
 */
export function parseAxRequest(request: OpenIdMessage): AxRequest {
    const fields = request.getExtension(AX_NS);
    if (!fields) {
        return { kind: 'none' };
    }
    if (fields.mode !== FETCH_REQUEST) {
        return { kind: 'unknown', mode: fields.mode };
    }

    const attributes = new Map<string, string>();
    for (const [key, value] of Object.entries(fields)) {
        if (key.startsWith(TYPE_PREFIX)) {
            attributes.set(key.slice(TYPE_PREFIX.length), value);
        }
    }
    return { kind: 'fetch', attributes };
}

// =============================================================================
// Response
// =============================================================================

/**
 * Values for the recognized attributes of a fetch request. The response
 * keeps the relying party's aliases.
 */
export function respond(fetch: FetchRequest, profile: AuthenticatedProfile): AttributeResponse {
    const values: AttributeValue[] = [];
    for (const [alias, typeUri] of fetch.attributes) {
        const source = SOURCES[typeUri];
        if (source) {
            values.push({ alias, typeUri, value: source(profile) });
        }
    }
    return values;
}

/**
 * Attach a fetch response to an assertion under the `ax` alias.
 *
 * @returns the attached keys, all of which must be signed
 */
export function attachFetchResponse(message: OpenIdMessage, response: AttributeResponse): string[] {
    const fields: Record<string, string> = { mode: FETCH_RESPONSE };
    for (const attribute of response) {
        fields[`type.${attribute.alias}`] = attribute.typeUri;
        fields[`value.${attribute.alias}`] = attribute.value;
    }
    return message.addExtension(AX_RESPONSE_ALIAS, AX_NS, fields);
}
