import type { CameraErrorCode, HealthStatus, SchedulerState, StatusReport } from './types.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function stateBadge(state: SchedulerState): string {
  switch (state) {
    case 'running':
      return `<span class="badge badge-ok">● Running</span>`;
    case 'paused':
      return `<span class="badge badge-muted">● Paused</span>`;
    case 'waiting_window':
      return `<span class="badge badge-warn">● Waiting for window</span>`;
  }
}

function healthBadge(status: HealthStatus): string {
  switch (status) {
    case 'ok':
      return `<span class="badge badge-ok">● Online</span>`;
    case 'degraded':
      return `<span class="badge badge-warn">● Degraded</span>`;
    case 'error':
      return `<span class="badge badge-err">● Offline</span>`;
  }
}

export function friendlyError(code: CameraErrorCode | null | undefined): string {
  switch (code) {
    case 'timeout': return 'Camera did not answer in time';
    case 'connection_refused': return 'Connection refused (camera service not running?)';
    case 'unreachable': return 'Camera unreachable';
    case 'auth_failed': return 'Camera rejected the credentials';
    case 'http_error': return 'Camera returned an HTTP error';
    case 'invalid_content': return 'Camera response was not an image';
    case 'storage_failed': return 'Could not write the snapshot to disk';
    case 'no_url': return 'No camera URL configured';
    default: return 'Unknown';
  }
}

function buildStatusRows(status: StatusReport): string {
  const { camera_error, camera_health } = status;

  const cameraCell = camera_error
    ? `${healthBadge(camera_health.status)}<details class="status-detail detail-err"><summary>${escapeHtml(friendlyError(camera_error.code))}</summary>${escapeHtml(camera_error.message)}</details>`
    : healthBadge(camera_health.status);

  return `
    <tr><td>Scheduler</td><td id="st-state">${stateBadge(status.state)}</td></tr>
    <tr><td>Camera</td><td id="st-camera">${cameraCell}</td></tr>
    <tr><td>Images</td><td id="st-count">${status.count}</td></tr>
    <tr><td>Last snapshot</td><td id="st-last" title="${escapeHtml(status.last_snapshot_tooltip ?? '')}">${escapeHtml(status.last_snapshot ?? 'never')}</td></tr>
    <tr><td>Sunrise / sunset</td><td id="st-sun">${status.sunrise ?? '--:--'} / ${status.sunset ?? '--:--'}</td></tr>
  `;
}

export function renderPage(status: StatusReport, title = 'Snapwatch'): string {
  const safeTitle = escapeHtml(title);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${safeTitle}</title>
  <link rel="stylesheet" href="/style.css">
</head>
<body>
  <header>
    <h1>${safeTitle}</h1>
  </header>
  <main class="panel-body">
    <div class="col-stream">
      <img id="latest" class="stream" src="/latest.jpg?t=${Date.now()}" alt="Latest snapshot"
           onerror="this.style.display='none'" onload="this.style.display=''">
    </div>
    <div class="col-status">
      <table class="status-table" id="status">${buildStatusRows(status)}</table>
      <div class="panel-actions">
        <button class="btn btn-muted" onclick="action('pause')">Pause</button>
        <button class="btn btn-ok" onclick="action('resume')">Resume</button>
        <button class="btn btn-info" onclick="action('snapshot')">Snapshot now</button>
        <button class="btn btn-warn" onclick="action('reload')">Reload config</button>
      </div>
      <ul class="event-log" id="event-log"></ul>
    </div>
  </main>
  <script>
    const STATE_LABELS = { running: 'Running', paused: 'Paused', waiting_window: 'Waiting for window' };
    const log = document.getElementById('event-log');

    function note(text) {
      const li = document.createElement('li');
      li.textContent = new Date().toLocaleTimeString() + ' ' + text;
      log.prepend(li);
      while (log.children.length > 20) log.lastChild.remove();
    }

    async function refreshStatus() {
      const res = await fetch('/status');
      if (!res.ok) return;
      const s = await res.json();
      document.getElementById('st-state').textContent = STATE_LABELS[s.state] || s.state;
      document.getElementById('st-camera').textContent =
        s.camera_health.status + (s.camera_error ? ' (' + s.camera_error.message + ')' : '');
      document.getElementById('st-count').textContent = s.count;
      const last = document.getElementById('st-last');
      last.textContent = s.last_snapshot || 'never';
      last.title = s.last_snapshot_tooltip || '';
      document.getElementById('st-sun').textContent = (s.sunrise || '--:--') + ' / ' + (s.sunset || '--:--');
    }

    async function action(name) {
      const res = await fetch('/action/' + name, { method: 'POST' });
      const body = await res.json().catch(() => ({}));
      if (!body.ok && body.error) note(name + ' failed: ' + body.error.message);
      refreshStatus();
    }

    const events = new EventSource('/events');
    events.onmessage = (msg) => {
      const ev = JSON.parse(msg.data);
      if (ev.type === 'snapshot') {
        document.getElementById('latest').src = '/latest.jpg?t=' + Date.now();
        note('Snapshot ' + ev.filename);
      } else if (ev.type === 'camera_error') {
        note('Camera error: ' + ev.message);
      } else if (ev.type === 'camera_health') {
        note('Camera health: ' + ev.status);
      } else if (ev.type === 'status' && ev.status === 'config_reloaded') {
        note('Configuration reloaded');
      }
      refreshStatus();
    };
  </script>
</body>
</html>`;
}
