import { createServer } from 'node:http'
import {
  ContextDirectory,
  computed,
  createLogger,
  escapeHtml,
  isLogLevel,
  type RenderScope,
  StateSource,
  useState,
} from '@patchline/live'
import { clientScript, LiveConnectionHandler, renderPage } from '@patchline/live-server'

const PORT = Number(process.env.PORT) || 3000
const level = process.env.LIVE_LOG_LEVEL ?? 'info'
const logger = createLogger({ level: isLogLevel(level) ? level : 'info', prefix: '[live]' })

const directory = new ContextDirectory({ connectTimeout: 30_000, logger })
const live = new LiveConnectionHandler({ directory, logger })

// Shared by every session. Pages bind to it through a per-session
// computed source, so closing a session never closes the clock itself.
const clock = new StateSource(0)
const ticker = setInterval(() => clock.update((n) => (n ?? 0) + 1), 1000)

const CLIENT = clientScript({ path: live.path })

function* page(scope: RenderScope): Iterable<string> {
  const [count, setCount] = useState(0)
  const [log, setLog] = useState<string>()
  const seconds = computed([clock], () => clock.current() ?? 0)

  const increment = scope.callback(() => {
    const next = (count.current() ?? 0) + 1
    setCount(next)
    setLog(`clicked at ${new Date().toISOString()}`)
  })

  yield '<!doctype html><html><head><title>patchline</title></head><body>'
  yield `<p>Server uptime: ${scope.live(seconds, (s) => `${s}s`)}</p>`
  yield `<p ${scope.attributes(count, (n) => ({ class: n % 2 === 0 ? 'even' : 'odd', 'data-many': n >= 10 }))}>`
  yield `Clicks: ${scope.live(count, (n) => String(n))}</p>`
  yield `<button onclick="live(${increment})">Click</button>`
  yield `<ul>${scope.live(log, (line) => `<li>${escapeHtml(line)}</li>`, { mode: 'append' })}</ul>`
  yield `<script data-context="${scope.contextId}">${CLIENT}</script>`
  yield '</body></html>'
}

const server = createServer((req, res) => {
  if (live.handleRequest(req, res)) return
  if (req.url !== '/') {
    res.writeHead(404).end('not found')
    return
  }
  renderPage(directory, page, res)
})

live.attach(server)

server.listen(PORT, () => {
  console.log(`Live view example listening on http://localhost:${PORT}`)
})

process.on('SIGINT', () => {
  console.log('\nShutting down...')
  clearInterval(ticker)
  live.close()
  directory.shutdown()
  server.close()
  process.exit(0)
})
