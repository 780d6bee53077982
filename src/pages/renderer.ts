import type { CallbackResult } from '../flows/types/callback-result.ts'
import { errorHexCode } from './error-hex.ts'
import { escapeHtml } from './escape-html.ts'
import {
  field,
  frame,
  progressLine,
  prompt,
  renderDocument,
  span,
} from './layout.ts'
import type { Viewport } from './viewport.ts'

export interface PageRenderer {
  /** Success or error screen for one callback outcome. */
  render: (result: CallbackResult, viewport: Viewport) => string
  /** Landing screen; `connectUrl` is null when the OAuth client is not configured. */
  renderLanding: (viewport: Viewport, connectUrl: string | null) => string
}

export interface PageRendererOptions {
  siteName: string
  /** Shown on the connect button, e.g. "DISCORD" */
  providerLabel: string
  supportContact?: string
  now?: () => Date
}

const pad2 = (value: number): string => String(value).padStart(2, '0')

/** `YYYY-MM-DD HH:MM:SS UTC` */
export const formatTimestamp = (date: Date): string =>
  `${date.getUTCFullYear()}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())} ` +
  `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())}:${pad2(date.getUTCSeconds())} UTC`

export const createPageRenderer = (
  options: PageRendererOptions,
): PageRenderer => {
  const { siteName, providerLabel, supportContact, now = () => new Date() } =
    options

  const header = (viewport: Viewport): string[] => [
    ...frame('amber', viewport, [
      { text: siteName, className: 'white' },
      { text: 'OAUTH AUTHENTICATION SYSTEM', className: 'dim' },
    ]),
    '',
  ]

  const renderSuccess = (
    result: Extract<CallbackResult, { kind: 'success' }>,
    viewport: Viewport,
  ): string => {
    const done = { text: 'OK', className: 'cyan' }
    const lines = [
      ...header(viewport),
      progressLine('Processing Authorization Code', viewport, 1, {
        text: '100%',
        className: 'white',
      }),
      progressLine('Exchanging Token', viewport, 1, done),
      progressLine('Fetching User Data', viewport, 1, done),
      progressLine('Saving to User Pool', viewport, 1, done),
      '',
      ...frame('ok', viewport, [
        { text: '█ AUTHENTICATION SUCCESSFUL █', className: 'ok' },
      ]),
      '',
      field('User ID', result.id, 'cyan'),
      field('Username', result.displayName, 'white'),
      field('Status', 'VERIFIED ■', 'cyan'),
      field('Pool Status', 'LINKED', 'cyan'),
      '',
      ...frame('amber', viewport, [
        {
          text: 'Account linked to the user pool.',
          className: 'white',
          align: 'left',
        },
        {
          text: 'You may now close this window.',
          className: 'dim',
          align: 'left',
        },
      ]),
      '',
      prompt(siteName),
    ]
    return renderDocument({
      title: `${siteName} - Authorization complete`,
      siteName,
      viewport,
      lines,
    })
  }

  const renderFailure = (
    result: Extract<CallbackResult, { kind: 'failure' }>,
    viewport: Viewport,
  ): string => {
    const lines = [
      ...header(viewport),
      progressLine('Processing Authorization', viewport, 0.4, {
        text: 'FAILED',
        className: 'fail',
      }),
      '',
      ...frame('fail', viewport, [
        { text: '█ AUTHENTICATION FAILED █', className: 'fail' },
      ]),
      '',
      field(
        'Error Code',
        `ERR 0x${errorHexCode(result.code)}: ${result.code}`,
        'fail',
      ),
      field('Description', result.message, 'cyan'),
      field('Timestamp', formatTimestamp(now()), 'cyan'),
      '',
      ...frame('amber', viewport, [
        {
          text: 'Authorization failed. Please try again.',
          className: 'cyan',
          align: 'left',
        },
        ...(supportContact
          ? [
              {
                text: `Contact ${supportContact} for help.`,
                className: 'dim',
                align: 'left' as const,
              },
            ]
          : []),
      ]),
      '',
      prompt(siteName),
    ]
    return renderDocument({
      title: `${siteName} - Authorization failed`,
      siteName,
      viewport,
      lines,
      footer: '<a href="/" class="connect-btn">[ RETURN HOME ]</a>',
    })
  }

  return {
    render: (result, viewport) =>
      result.kind === 'success'
        ? renderSuccess(result, viewport)
        : renderFailure(result, viewport),

    renderLanding: (viewport, connectUrl) => {
      const ok = { text: 'OK', className: 'cyan' }
      const lines = [
        ...header(viewport),
        progressLine('Memory Test', viewport, 1, ok),
        progressLine('Network Interface', viewport, 1, ok),
        progressLine('OAuth Module', viewport, connectUrl ? 1 : 0, {
          text: connectUrl ? 'READY' : 'NOT CONFIGURED',
          className: connectUrl ? 'cyan' : 'fail',
        }),
        '',
        connectUrl
          ? `Press ${span('white', 'CONNECT')} to authorize.`
          : span('fail', 'OAuth client credentials are not configured.'),
        '',
        prompt(siteName),
      ]
      return renderDocument({
        title: `${siteName} - ${providerLabel} OAuth`,
        siteName,
        viewport,
        lines,
        footer: connectUrl
          ? `<a href="${escapeHtml(connectUrl)}" class="connect-btn">[ CONNECT WITH ${escapeHtml(providerLabel)} ]</a>`
          : undefined,
      })
    },
  }
}
