/**
 * Client-side live reload script
 *
 * Builders embed this into generated pages when PAGEWATCH_LIVERELOAD_URL is
 * set. The server sends a single "reload" frame and closes; the reloaded page
 * opens a new connection.
 */

export function getReloadScript(liveReloadUrl: string): string {
  return `
<script>
(function() {
  const socket = new WebSocket(${JSON.stringify(liveReloadUrl)});
  socket.onmessage = function(event) {
    if (event.data === 'reload') {
      socket.close();
      location.reload();
    }
  };

  window.onbeforeunload = function() {
    socket.close();
  };
})();
</script>
`
}
