import type { TaskFailedParams } from '../types.js';
import { escapeHtml } from '../../utils/html.js';

export function taskFailedTemplate(params: TaskFailedParams): string {
  const steps = params.completedSteps && params.completedSteps.length > 0
    ? `
<p>Before stopping I completed:</p>
<ul>
${params.completedSteps.map((step) => `  <li>${escapeHtml(step)}</li>`).join('\n')}
</ul>`
    : '';

  return `
<p>Hello,</p>
<p>Unfortunately I could not finish your request.</p>
<p style="border-left: 4px solid #ef4444; padding-left: 12px;"><strong>Reason:</strong> ${escapeHtml(params.error)}</p>
${steps}
<p>You can try again or rephrase the request.</p>
`.trim();
}
