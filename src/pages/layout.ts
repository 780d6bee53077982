import { escapeHtml } from './escape-html.ts'
import type { Viewport } from './viewport.ts'

const STYLES = `
  :root {
    --bg: #0000aa;
    --fg: #c0c0c0;
    --white: #ffffff;
    --amber: #ffb000;
    --yellow: #ffff55;
    --cyan: #55ffff;
    --ok: #55ff55;
    --fail: #ff5555;
    --dim: #8080c0;
  }
  * { box-sizing: border-box; }
  body {
    margin: 0;
    min-height: 100vh;
    background: var(--bg);
    color: var(--fg);
    font-family: 'VT323', 'Share Tech Mono', 'Courier New', monospace;
  }
  .screen { padding: 24px; }
  .screen.mobile { padding: 12px; font-size: 14px; }
  .bios-header {
    display: flex;
    justify-content: space-between;
    background: var(--fg);
    color: var(--bg);
    padding: 2px 12px;
  }
  .terminal { white-space: pre; overflow-x: auto; line-height: 1.25; }
  .white { color: var(--white); }
  .amber { color: var(--amber); }
  .yellow { color: var(--yellow); }
  .cyan { color: var(--cyan); }
  .ok { color: var(--ok); }
  .fail { color: var(--fail); }
  .dim { color: var(--dim); }
  .cursor::after { content: '_'; animation: blink 1s steps(1) infinite; }
  @keyframes blink { 50% { opacity: 0; } }
  .connect-btn {
    display: inline-block;
    margin-top: 16px;
    padding: 8px 24px;
    border: 2px solid var(--amber);
    color: var(--amber);
    text-decoration: none;
  }
  .connect-btn:hover { background: var(--amber); color: var(--bg); }
`

/** Reveals the terminal one line at a time; the full text is already in the markup. */
const TYPEWRITER_SCRIPT = `
  (function () {
    var el = document.getElementById('terminal-text');
    if (!el) return;
    var lines = el.innerHTML.split('\\n');
    el.innerHTML = '';
    var i = 0;
    (function next() {
      if (i >= lines.length) return;
      el.innerHTML += lines[i++] + '\\n';
      setTimeout(next, 35);
    })();
  })();
`

export const FRAME_WIDTH: Record<Viewport, number> = {
  desktop: 78,
  mobile: 37,
}

export const span = (className: string, text: string): string =>
  `<span class="${className}">${escapeHtml(text)}</span>`

const centerText = (text: string, width: number): string => {
  const room = Math.max(0, width - text.length)
  const left = Math.floor(room / 2)
  return `${' '.repeat(left)}${text}${' '.repeat(room - left)}`
}

/**
 * Box-drawn frame. Rows longer than the frame are left unpadded rather
 * than cut.
 */
export const frame = (
  borderClass: string,
  viewport: Viewport,
  rows: Array<{ text: string; className: string; align?: 'center' | 'left' }>,
): string[] => {
  const width = FRAME_WIDTH[viewport]
  const edge = '═'.repeat(width)
  const body = rows.map(({ text, className, align = 'center' }) => {
    const padded =
      align === 'center'
        ? centerText(text, width - 2)
        : `  ${text}`.padEnd(width - 2)
    return `${span(borderClass, '║')} ${span(className, padded)} ${span(borderClass, '║')}`
  })
  return [
    span(borderClass, `╔${edge}╗`),
    ...body,
    span(borderClass, `╚${edge}╝`),
  ]
}

/** `  Label.............. value` */
export const field = (
  label: string,
  value: string,
  valueClass: string,
): string => `  ${span('dim', label.padEnd(20, '.'))} ${span(valueClass, value)}`

export const progressLine = (
  label: string,
  viewport: Viewport,
  filled: number,
  status: { text: string; className: string },
): string => {
  const barWidth = viewport === 'mobile' ? 10 : 20
  const fill = Math.round(barWidth * filled)
  const labelWidth = viewport === 'mobile' ? 20 : 34
  return `${span('dim', label.padEnd(labelWidth, '.'))} [${span(filled >= 1 ? 'ok' : 'fail', '█'.repeat(fill))}${span('dim', '░'.repeat(barWidth - fill))}] ${span(status.className, status.text)}`
}

export const prompt = (siteName: string): string =>
  `${span('dim', `C:\\${siteName.replace(/\s+/g, '_')}>`)}<span class="cursor"></span>`

export const renderDocument = (options: {
  title: string
  siteName: string
  viewport: Viewport
  lines: string[]
  /** Raw HTML placed after the terminal, e.g. the connect button */
  footer?: string
}): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(options.title)}</title>
  <style>${STYLES}</style>
</head>
<body>
  <div class="screen ${options.viewport}">
    <div class="bios-header"><span>${escapeHtml(options.siteName)} SETUP UTILITY</span></div>
    <pre id="terminal-text" class="terminal">${options.lines.join('\n')}</pre>
    ${options.footer ?? ''}
  </div>
  <script>${TYPEWRITER_SCRIPT}</script>
</body>
</html>`
