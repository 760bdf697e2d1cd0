/**
 * OpenID Provider - Protocol Message Model
 *
 * An OpenID message is an ordered set of key/value fields. Keys are stored
 * without the `openid.` prefix, which is added back when the message travels
 * indirectly (URL query) and omitted in Key-Value Form (direct responses).
 *
 * @see OpenID 2.0 Section 4.1 - Protocol Messages
 */

import { OPENID2_NS, OPENID_PREFIX } from './constants';
import { MessageError } from './errors/index';

/** Characters Key-Value Form cannot carry inside a key or value */
const KV_FORBIDDEN_KEY = /[:\n]/;

export class OpenIdMessage {
    private readonly fields = new Map<string, string>();

    /** Where an indirect response is sent when it carries no return_to */
    private destination?: string;

    /**
     * Build a message from `openid.`-prefixed request parameters.
     * Parameters outside the openid namespace are ignored.
     */
    static fromParameters(params: Readonly<Record<string, string>>): OpenIdMessage {
        const message = new OpenIdMessage();
        for (const [key, value] of Object.entries(params)) {
            if (key.startsWith(OPENID_PREFIX)) {
                message.set(key.slice(OPENID_PREFIX.length), value);
            }
        }
        return message;
    }

    /** Start a message carrying the OpenID 2.0 namespace */
    static create(): OpenIdMessage {
        return new OpenIdMessage().set('ns', OPENID2_NS);
    }

    get(key: string): string | undefined {
        return this.fields.get(key);
    }

    has(key: string): boolean {
        return this.fields.has(key);
    }

    set(key: string, value: string): this {
        this.fields.set(key, value);
        return this;
    }

    delete(key: string): this {
        this.fields.delete(key);
        return this;
    }

    keys(): string[] {
        return [...this.fields.keys()];
    }

    /** Fields as a plain object, keys without prefix */
    toRecord(): Record<string, string> {
        return Object.fromEntries(this.fields);
    }

    /** Fields as indirect-message parameters, keys with the `openid.` prefix */
    toParameters(): Record<string, string> {
        const params: Record<string, string> = {};
        for (const [key, value] of this.fields) {
            params[OPENID_PREFIX + key] = value;
        }
        return params;
    }

    /**
     * Encode as Key-Value Form: one `key:value\n` line per field.
     *
     * @param keys - restrict and order the output (used for signing)
     */
    toKeyValueForm(keys: readonly string[] = this.keys()): string {
        let body = '';
        for (const key of keys) {
            const value = this.fields.get(key);
            if (value === undefined) {
                throw new MessageError(`Field not present in message: ${key}`);
            }
            if (KV_FORBIDDEN_KEY.test(key) || value.includes('\n')) {
                throw new MessageError(`Field cannot be encoded in key-value form: ${key}`);
            }
            body += `${key}:${value}\n`;
        }
        return body;
    }

    // -------------------------------------------------------------------------
    // Extensions
    // -------------------------------------------------------------------------

    /**
     * Find the alias a namespace URI is declared under (`openid.ns.<alias>`).
     */
    getExtensionAlias(namespaceUri: string): string | undefined {
        for (const [key, value] of this.fields) {
            if (key.startsWith('ns.') && value === namespaceUri) {
                return key.slice('ns.'.length);
            }
        }
        return undefined;
    }

    /**
     * Read the fields of an extension, keys relative to its alias.
     * Returns undefined when the namespace is not declared.
     */
    getExtension(namespaceUri: string): Record<string, string> | undefined {
        const alias = this.getExtensionAlias(namespaceUri);
        if (alias === undefined) return undefined;

        const prefix = `${alias}.`;
        const extension: Record<string, string> = {};
        for (const [key, value] of this.fields) {
            if (key.startsWith(prefix)) {
                extension[key.slice(prefix.length)] = value;
            }
        }
        return extension;
    }

    /**
     * Attach extension fields under the given alias.
     *
     * @returns the attached keys, so the caller can sign them
     */
    addExtension(alias: string, namespaceUri: string, fields: Readonly<Record<string, string>>): string[] {
        const attached = [`ns.${alias}`];
        this.set(`ns.${alias}`, namespaceUri);
        for (const [key, value] of Object.entries(fields)) {
            this.set(`${alias}.${key}`, value);
            attached.push(`${alias}.${key}`);
        }
        return attached;
    }

    // -------------------------------------------------------------------------
    // Indirect Responses
    // -------------------------------------------------------------------------

    /**
     * Set the relying party URL of a response that does not sign return_to
     * (negative assertions).
     */
    setDestination(returnTo: string): this {
        this.destination = returnTo;
        return this;
    }

    /**
     * URL the user agent is redirected to: openid.return_to (or the
     * destination set on the message) with every field of this message
     * appended as a query parameter.
     *
     * @throws MessageError when there is no destination or it is not an absolute URL
     */
    getDestinationUrl(): string {
        const returnTo = this.get('return_to') ?? this.destination;
        if (!returnTo) {
            throw new MessageError('Message has no return_to');
        }

        let url: URL;
        try {
            url = new URL(returnTo);
        } catch (err) {
            throw new MessageError(`openid.return_to is not an absolute URL: ${returnTo}`, { cause: err });
        }

        for (const [key, value] of Object.entries(this.toParameters())) {
            url.searchParams.set(key, value);
        }
        return url.toString();
    }
}
