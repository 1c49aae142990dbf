import type { ServerResponse } from 'node:http'
import type { ContextDirectory, LiveContext, PageRender } from '@patchline/live'

/**
 * Render a page as an HTML response, streaming it into `res` as it is
 * produced. Returns the live context the page created, if any. Once the
 * directory has been shut down the request is answered 503 instead.
 *
 * @example
 * const server = createServer((req, res) => {
 *   if (live.handleRequest(req, res)) return
 *   renderPage(directory, (scope) => counterPage(scope, counter), res)
 * })
 */
export function renderPage(directory: ContextDirectory, page: PageRender, res: ServerResponse): LiveContext | null {
  if (directory.isShutdown) {
    res.writeHead(503, { 'Content-Type': 'text/plain; charset=utf-8' })
    res.end('Server is shutting down')
    return null
  }
  res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' })
  return directory.render(page, res)
}
