import http from "node:http";
import { WebSocketServer } from "ws";
import { loadConfig } from "./config.js";
import { createLedger, type TaskLedger, type TaskRecord } from "./ledger.js";
import { FileEventLog } from "./log.js";
import { LifecycleReporter, isProcessRunning, sweepAbandoned } from "./reporter.js";
import { errorMessage } from "./utils.js";

const DASHBOARD_HTML = `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>Conductor</title>
    <style>
      :root {
        --bg-base: #111418;
        --bg-card: #252A31;
        --border: #383E47;
        --text-primary: #F6F7F9;
        --text-muted: #738091;
        --blue: #4C90F0;
        --green: #32A467;
        --red: #E76A6E;
      }

      * { box-sizing: border-box; margin: 0; padding: 0; }

      body {
        font-family: -apple-system, BlinkMacSystemFont, sans-serif;
        color: var(--text-primary);
        background: var(--bg-base);
        line-height: 1.5;
      }

      header {
        padding: 20px 32px;
        border-bottom: 1px solid var(--border);
        display: flex;
        align-items: center;
        justify-content: space-between;
      }

      h1 { font-size: 18px; font-weight: 600; }
      main { padding: 24px 32px; }
      #status { color: var(--text-muted); font-size: 13px; }
      #status.connected { color: var(--green); }

      table { width: 100%; border-collapse: collapse; font-size: 13px; }
      th, td { text-align: left; padding: 8px 10px; border-bottom: 1px solid var(--border); vertical-align: top; }
      th { color: var(--text-muted); font-weight: 500; }
      tr:hover td { background: var(--bg-card); }
      .mono { font-family: ui-monospace, monospace; }
      .running { color: var(--blue); }
      .completed { color: var(--green); }
      .failed { color: var(--red); }
      .detail { color: var(--text-muted); white-space: pre-wrap; }
    </style>
  </head>
  <body>
    <header>
      <h1>Conductor</h1>
      <span id="status">Connecting</span>
    </header>
    <main>
      <table>
        <thead>
          <tr><th>Task</th><th>Status</th><th>Agent</th><th>Project</th><th>Started</th><th>Result</th></tr>
        </thead>
        <tbody id="tasks"></tbody>
      </table>
    </main>
    <script>
      const statusEl = document.getElementById("status");
      const tasksEl = document.getElementById("tasks");

      function escapeHtml(text) {
        const map = {
          '&': '&amp;',
          '<': '&lt;',
          '>': '&gt;',
          '"': '&quot;',
          "'": '&#39;'
        };
        return String(text).replace(/[&<>"']/g, (char) => map[char]);
      }

      function formatTime(isoString) {
        const date = new Date(isoString);
        return date.toLocaleString([], { month: 'short', day: 'numeric', hour: '2-digit', minute: '2-digit' });
      }

      function renderTasks(tasks) {
        if (tasks.length === 0) {
          tasksEl.innerHTML = '<tr><td colspan="6" class="detail">No tasks yet</td></tr>';
          return;
        }
        tasksEl.innerHTML = tasks.map((task) => {
          const result = task.status === "failed" ? task.error : task.summary;
          return '<tr>' +
            '<td class="mono">' + escapeHtml(task.taskId.slice(0, 8)) + '</td>' +
            '<td class="' + task.status + '">' + task.status + '</td>' +
            '<td>' + escapeHtml(task.agentKind) + (task.model ? ' (' + escapeHtml(task.model) + ')' : '') + '</td>' +
            '<td class="mono">' + escapeHtml(task.projectPath) + '</td>' +
            '<td>' + formatTime(task.createdAt) + '</td>' +
            '<td class="detail">' + escapeHtml(result || "") + '</td>' +
            '</tr>';
        }).join("");
      }

      async function fetchTasks() {
        try {
          const response = await fetch("/api/tasks");
          const data = await response.json();
          renderTasks(data.tasks);
        } catch (err) {
          console.error("Failed to fetch tasks:", err);
          statusEl.textContent = "Error loading data";
        }
      }

      function connect() {
        const protocol = window.location.protocol === "https:" ? "wss" : "ws";
        const socket = new WebSocket(protocol + "://" + window.location.host + "/ws");

        socket.addEventListener("open", () => {
          statusEl.textContent = "Live";
          statusEl.classList.add("connected");
        });

        socket.addEventListener("message", (event) => {
          const payload = JSON.parse(event.data);
          if (payload.type === "snapshot") {
            renderTasks(payload.tasks);
            statusEl.textContent = "Live · " + payload.running + " running";
          }
        });

        socket.addEventListener("close", () => {
          statusEl.textContent = "Reconnecting";
          statusEl.classList.remove("connected");
          setTimeout(connect, 2000);
        });
      }

      fetchTasks();
      connect();
    </script>
  </body>
</html>
`;

export type DashboardOptions = {
  port?: number;
  host?: string;
  pollMs?: number;
};

export type DashboardSnapshot = {
  type: "snapshot";
  tasks: TaskRecord[];
  running: number;
};

export type DashboardResponse = {
  status: number;
  contentType: string;
  body: string;
};

const DEFAULT_LIMIT = 50;

function json(status: number, data: unknown): DashboardResponse {
  return { status, contentType: "application/json", body: JSON.stringify(data) };
}

export async function buildSnapshot(ledger: TaskLedger, limit = DEFAULT_LIMIT): Promise<DashboardSnapshot> {
  const tasks = await ledger.listRecent(limit);
  const running = await ledger.listRunning();
  return { type: "snapshot", tasks, running: running.length };
}

/** Routes a dashboard request. Anything outside `/api/` gets the page. */
export async function routeRequest(ledger: TaskLedger, requestUrl: string): Promise<DashboardResponse> {
  const parsed = new URL(requestUrl, "http://dashboard.local");

  if (parsed.pathname === "/api/tasks") {
    const rawLimit = parsed.searchParams.get("limit");
    const limit = rawLimit === null ? DEFAULT_LIMIT : Number(rawLimit);
    if (!Number.isInteger(limit) || limit < 1) {
      return json(400, { error: "limit must be a positive integer" });
    }
    return json(200, { tasks: await ledger.listRecent(limit) });
  }

  const taskMatch = parsed.pathname.match(/^\/api\/tasks\/([^/]+)$/);
  if (taskMatch) {
    const taskId = decodeURIComponent(taskMatch[1]);
    const record = await ledger.get(taskId);
    return record ? json(200, record) : json(404, { error: "Task not found", taskId });
  }

  if (parsed.pathname.startsWith("/api/")) {
    return json(404, { error: "Not found" });
  }

  return { status: 200, contentType: "text/html; charset=utf-8", body: DASHBOARD_HTML };
}

export async function startDashboard(options: DashboardOptions = {}) {
  const config = loadConfig();
  const eventLog = new FileEventLog(config.logDir);
  const ledger = createLedger(config, eventLog);
  await ledger.init();
  const reporter = new LifecycleReporter(ledger, { eventLog });

  const port = options.port ?? 8787;
  const host = options.host ?? "127.0.0.1";
  const pollMs = options.pollMs ?? 1500;

  const server = http.createServer((req, res) => {
    routeRequest(ledger, req.url || "/").then(
      (response) => {
        res.writeHead(response.status, {
          "Content-Type": response.contentType,
          "Cache-Control": "no-cache, no-store, must-revalidate",
        });
        res.end(response.body);
      },
      (error: unknown) => {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: errorMessage(error) }));
      }
    );
  });

  const wss = new WebSocketServer({ server, path: "/ws" });

  const broadcast = (payload: unknown) => {
    const message = JSON.stringify(payload);
    for (const client of wss.clients) {
      if (client.readyState === 1) {
        client.send(message);
      }
    }
  };

  const reportPollError = (error: unknown) => {
    process.stderr.write(`dashboard poll failed: ${errorMessage(error)}\n`);
  };

  wss.on("connection", (socket) => {
    buildSnapshot(ledger).then((snapshot) => socket.send(JSON.stringify(snapshot)), reportPollError);
  });

  let lastHash = "";

  const poll = async () => {
    const swept = await sweepAbandoned(ledger, reporter, isProcessRunning);
    if (swept.length > 0) await eventLog.append("sweep", { taskIds: swept });
    const snapshot = await buildSnapshot(ledger);
    const next = JSON.stringify(snapshot);
    if (next !== lastHash) {
      lastHash = next;
      broadcast(snapshot);
    }
  };

  await poll();
  setInterval(() => {
    poll().catch(reportPollError);
  }, pollMs);

  server.listen(port, host, () => {
    process.stdout.write(`Dashboard running at http://${host}:${port}\n`);
  });
}
