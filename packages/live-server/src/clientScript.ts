import { DEFAULT_LIVE_PATH, LIVE_ATTRIBUTE, PROTOCOL_VERSION } from '@patchline/live'

export interface ClientScriptOptions {
  /** Path of the connection endpoint. Defaults to '/__live'. */
  path?: string
}

/**
 * Browser runtime for a rendered page, to be inlined as
 * `<script data-context="${scope.contextId}">${clientScript()}</script>`.
 *
 * It opens a WebSocket to the connection endpoint (announcing the protocol
 * version), applies each batch to the elements marked with `data-live`, and
 * exposes `window.live(callbackId, ...args)` for event handlers.
 * Structured updates other than attributes are left to application code.
 */
export function clientScript(options: ClientScriptOptions = {}): string {
  const path = JSON.stringify(options.path ?? DEFAULT_LIVE_PATH)
  return `(() => {
  const context = document.currentScript.dataset.context
  const scheme = location.protocol === 'https:' ? 'wss://' : 'ws://'
  const ws = new WebSocket(scheme + location.host + ${path} + '?id=' + encodeURIComponent(context) + '&v=${PROTOCOL_VERSION}')
  const find = (id) => document.querySelector('[${LIVE_ATTRIBUTE}="' + id + '"]')
  const setAttributes = (node, attributes) => {
    for (const [name, value] of Object.entries(attributes)) {
      if (value === null || value === false) node.removeAttribute(name)
      else node.setAttribute(name, value === true ? '' : String(value))
    }
  }
  ws.onmessage = (event) => {
    for (const patch of JSON.parse(event.data)) {
      const node = find(patch.targetId)
      if (!node) continue
      if (patch.mode === 'delete') node.remove()
      else if (patch.mode === 'attribute') setAttributes(node, patch.payload)
      else if (patch.encoding !== 'markup') continue
      else if (patch.mode === 'replace') node.innerHTML = patch.payload
      else if (patch.mode === 'append') node.insertAdjacentHTML('beforeend', patch.payload)
      else if (patch.mode === 'prepend') node.insertAdjacentHTML('afterbegin', patch.payload)
    }
  }
  window.live = (id, ...args) => ws.send(args.length ? id + ':' + JSON.stringify(args) : String(id))
})()`
}
