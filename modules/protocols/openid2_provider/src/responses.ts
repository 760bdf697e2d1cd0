/**
 * OpenID 2.0 Provider - Browser Responses
 *
 * The confirmation detour: login redirect and the realm confirmation page.
 */

import { escapeHtml, html, redirect, type StructuredResponse } from '@openid-provider/shared';

// =============================================================================
// Login Detour
// =============================================================================

/**
 * Send the user to the login router. After login it returns the user to
 * `from`, which re-renders the pending confirmation.
 */
export function loginRedirect(loginRouterUrl: string, from: string, setCookie?: string): StructuredResponse {
    const url = new URL(loginRouterUrl);
    url.searchParams.set('from', from);
    return redirect(url.toString(), setCookie);
}

// =============================================================================
// Confirmation Page
// =============================================================================

export interface ConfirmationPageParams {
    realm: string;
    returnTo?: string;
    /** Identity URL that will be disclosed */
    identity: string;
    confirmUrl: string;
    csrfToken: string;
}

/**
 * Render the page asking the user to approve a realm.
 */
export function confirmationPage(params: ConfirmationPageParams, setCookie?: string): StructuredResponse {
    const realm = escapeHtml(params.realm);
    const returnTo = params.returnTo ? `<p class="return-to">${escapeHtml(params.returnTo)}</p>` : '';

    const body = `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>Sign in to ${realm}</title>
    <style>
        body {
            font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
            display: flex;
            justify-content: center;
            align-items: center;
            min-height: 100vh;
            margin: 0;
            background-color: #f5f5f5;
        }
        .container {
            text-align: center;
            padding: 2rem;
            background: white;
            border-radius: 8px;
            box-shadow: 0 2px 4px rgba(0,0,0,0.1);
            max-width: 480px;
        }
        .return-to, .identity {
            font-size: 0.875rem;
            color: #999;
            word-break: break-all;
        }
        button {
            margin: 0 0.5rem;
            padding: 0.5rem 1.5rem;
        }
    </style>
</head>
<body>
    <div class="container">
        <h1>Sign in to ${realm}?</h1>
        ${returnTo}
        <p>The site will receive your identity and email address.</p>
        <p class="identity">${escapeHtml(params.identity)}</p>
        <form method="post" action="${escapeHtml(params.confirmUrl)}">
            <input type="hidden" name="csrf_token" value="${escapeHtml(params.csrfToken)}">
            <input type="hidden" name="realm" value="${realm}">
            <button type="submit" name="decision" value="approve">Continue</button>
            <button type="submit" name="decision" value="cancel">Cancel</button>
        </form>
    </div>
</body>
</html>`;

    return html(body, 200, setCookie);
}
