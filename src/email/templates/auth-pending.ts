import type { AuthPendingParams } from '../types.js';
import { escapeHtml } from '../../utils/html.js';

export function authPendingTemplate(params: AuthPendingParams): string {
  const app = escapeHtml(params.app);
  const link = params.redirectUrl
    ? `<p>Please connect your account: <a href="${escapeHtml(params.redirectUrl)}">Connect ${app}</a></p>`
    : `<p>Please connect your ${app} account and send the request again.</p>`;

  return `
<p>Hello,</p>
<p>To complete your request I need access to <strong>${app}</strong>, which is not connected yet.</p>
${link}
<p>Once the connection is authorized, reply to this email and I will carry on.</p>
`.trim();
}
