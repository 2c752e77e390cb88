import { describe, it, expect } from 'vitest';
import { replyTemplate } from './reply.js';
import { taskFailedTemplate } from './task-failed.js';
import { authPendingTemplate } from './auth-pending.js';

describe('email/templates', () => {
  it('keeps HTML replies as they are', () => {
    expect(replyTemplate('  <p>Done</p> ')).toBe(
      '<p>Done</p>\n<p style="color: #666; font-size: 12px;"><em>This reply was generated automatically.</em></p>'
    );
  });

  it('escapes plain-text replies into paragraphs', () => {
    expect(replyTemplate('a < b\nc')).toBe(
      '<p>a &lt; b<br>c</p>\n<p style="color: #666; font-size: 12px;"><em>This reply was generated automatically.</em></p>'
    );
  });

  it('lists completed steps in the failure notice', () => {
    const html = taskFailedTemplate({ error: 'Step limit <3>', completedSteps: ['Ran GITHUB_CREATE_AN_ISSUE'] });

    expect(html).toContain('<strong>Reason:</strong> Step limit &lt;3&gt;</p>');
    expect(html).toContain('<li>Ran GITHUB_CREATE_AN_ISSUE</li>');
  });

  it('omits the step list when nothing was completed', () => {
    expect(taskFailedTemplate({ error: 'x' })).not.toContain('<ul>');
  });

  it('asks the user to connect the app, with or without a link', () => {
    expect(authPendingTemplate({ app: 'github', redirectUrl: 'https://auth.example.com/c?a=1&b=2' })).toContain(
      '<a href="https://auth.example.com/c?a=1&amp;b=2">Connect github</a>'
    );
    expect(authPendingTemplate({ app: 'slack' })).toContain(
      '<p>Please connect your slack account and send the request again.</p>'
    );
  });
});
