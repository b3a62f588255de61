import type { FileRole } from "../lib/contentClassifier";
import { formatDisplayTime } from "../lib/reportTime";
import type { StorageMode } from "../storage/types";
import { escapeHtml } from "./markdownRenderer";

export interface AttachmentLink {
  filename: string;
  locator: string;
  role: FileRole;
}

interface ReportHeader {
  agentName: string;
  title: string;
  tag: string;
  hostLabel: string;
  submittedAt: Date;
  timeZone: string;
}

export interface ReportPageData extends ReportHeader {
  mode: StorageMode;
  bodyHtml: string;
  attachments: AttachmentLink[];
}

export interface ReportEmailData extends ReportHeader {
  body: string;
  bodyHtml: string;
  attachments: AttachmentLink[];
  artifactLocator: string;
}

export function reportSubject(agentName: string, title: string, tag: string): string {
  return `[${agentName}] ${title} - Tag: ${tag}`;
}

const PAGE_STYLES = `
    body { font-family: Arial, sans-serif; max-width: 1200px; margin: 0 auto; padding: 20px; line-height: 1.6; }
    h1, h2, h3 { color: #333; }
    .metadata { color: #666; margin-bottom: 20px; padding: 10px; background: #f9f9f9; border-radius: 5px; }
    .metadata .tag { font-size: 1.2em; font-weight: bold; color: #0066cc; background: #e3f2fd; padding: 4px 8px; border-radius: 4px; display: inline-block; margin-bottom: 10px; }
    .metadata .local-mode { color: #ff6600; font-weight: bold; background: #fff3e0; padding: 4px 8px; border-radius: 4px; display: inline-block; margin-bottom: 10px; }
    .content { background: #fff; padding: 30px; border-radius: 5px; margin-bottom: 30px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
    pre { white-space: pre-wrap; word-wrap: break-word; background: #f5f5f5; padding: 15px; border-radius: 5px; overflow-x: auto; }
    code { background: #f5f5f5; padding: 2px 4px; border-radius: 3px; font-family: monospace; }
    table { border-collapse: collapse; width: 100%; margin: 15px 0; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background: #f5f5f5; font-weight: bold; }
    blockquote { border-left: 4px solid #ddd; margin: 1em 0; padding-left: 1em; color: #666; }
    .math-display { display: block; text-align: center; margin: 1em 0; }
    .files { display: grid; grid-template-columns: repeat(auto-fill, minmax(300px, 1fr)); gap: 20px; }
    .file { border: 1px solid #ddd; padding: 15px; border-radius: 5px; background: white; }
    .file img { max-width: 100%; height: auto; margin-top: 10px; }
    .file a { color: #0066cc; text-decoration: none; }`;

const MATHJAX_SCRIPTS = `
  <script>
    window.MathJax = {
      tex: {
        inlineMath: [['$', '$'], ['\\\\(', '\\\\)']],
        displayMath: [['$$', '$$'], ['\\\\[', '\\\\]']],
        processEscapes: true,
        packages: {'[+]': ['ams', 'noerrors']}
      },
      options: {
        skipHtmlTags: ['script', 'noscript', 'style', 'textarea', 'pre', 'code']
      },
      loader: { load: ['[tex]/ams', '[tex]/noerrors'] }
    };
  </script>
  <script id="MathJax-script" async src="https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-mml-chtml.js"></script>`;

function renderAttachmentCards(attachments: AttachmentLink[]): string {
  if (attachments.length === 0) return "";
  const cards = attachments
    .map((file) => {
      const href = escapeHtml(file.locator);
      const name = escapeHtml(file.filename);
      const preview = file.role === "image" ? `<br><img src="${href}" alt="${name}">` : "";
      return `
    <div class="file">
      <strong>${name}</strong><br>
      <a href="${href}" target="_blank">Open</a>${preview}
    </div>`;
    })
    .join("");
  return `
  <h2>Attachments (${attachments.length})</h2>
  <div class="files">${cards}
  </div>`;
}

// Browsable artifact stored as index.html
export function renderReportPage(data: ReportPageData): string {
  const title = escapeHtml(data.title);
  const agentName = escapeHtml(data.agentName);
  const modeBadge =
    data.mode === "local" ? `\n    <div class="local-mode">LOCAL MODE</div>` : "";

  return `<!DOCTYPE html>
<html>
<head>
  <title>${agentName} - ${title}</title>
  <meta charset="UTF-8">
  <style>${PAGE_STYLES}
  </style>
</head>
<body>
  <h1>${title}</h1>
  <div class="metadata">
    <div class="tag">Report Tag: ${data.tag}</div>${modeBadge}
    <strong>Agent:</strong> ${agentName}<br>
    <strong>Hostname:</strong> ${escapeHtml(data.hostLabel)}<br>
    <strong>Time (12-hour):</strong> ${formatDisplayTime(data.submittedAt, data.timeZone, true)}<br>
    <strong>Time (24-hour):</strong> ${formatDisplayTime(data.submittedAt, data.timeZone, false)}
  </div>

  <div class="content">
    <h2>Report Content</h2>
    ${data.bodyHtml}
  </div>
${MATHJAX_SCRIPTS}
${renderAttachmentCards(data.attachments)}
</body>
</html>`;
}

export function renderReportEmailText(data: ReportEmailData): string {
  const attachmentList =
    data.attachments.length > 0
      ? `Attachments (${data.attachments.length}):\n${data.attachments
          .map((file) => `- ${file.filename}`)
          .join("\n")}\n\n`
      : "";

  return `Report from ${data.agentName}
Report Tag: ${data.tag}
Hostname: ${data.hostLabel}

${data.body}

${attachmentList}View full report:
${data.artifactLocator}
`;
}

export function renderReportEmailHtml(data: ReportEmailData): string {
  const images = data.attachments.filter((file) => file.role === "image");
  const others = data.attachments.filter((file) => file.role !== "image");

  let html = `
<div style="font-family: Arial, sans-serif; max-width: 800px; margin: 0 auto;">
  <h2 style="color: #333;">Report from ${escapeHtml(data.agentName)}</h2>
  <div style="color: #666; margin-bottom: 20px;">
    <div style="font-size: 1.2em; font-weight: bold; color: #0066cc; background: #e3f2fd; padding: 4px 8px; border-radius: 4px; display: inline-block; margin-bottom: 10px;">Report Tag: ${data.tag}</div><br>
    <strong>Title:</strong> ${escapeHtml(data.title)}<br>
    <strong>Hostname:</strong> ${escapeHtml(data.hostLabel)}<br>
    <strong>Time (12-hour):</strong> ${formatDisplayTime(data.submittedAt, data.timeZone, true)}<br>
    <strong>Time (24-hour):</strong> ${formatDisplayTime(data.submittedAt, data.timeZone, false)}
  </div>

  <div style="background:#f5f5f5; padding:20px; border-radius:5px; margin-bottom:30px;">
    <h3 style="margin-top:0;">Report Content</h3>
    <div style="line-height: 1.6;">${data.bodyHtml}</div>
  </div>
`;

  // Every image is shown through its link, embedded or not
  if (images.length > 0) {
    html += `
  <div style="margin-bottom:30px;">
    <h3>Images (${images.length})</h3>`;
    for (const image of images) {
      const href = escapeHtml(image.locator);
      const name = escapeHtml(image.filename);
      html += `
    <div style="border: 1px solid #ddd; padding: 10px; border-radius: 5px; background: white; margin-bottom: 15px;">
      <div style="font-weight: bold; margin-bottom: 10px;">${name}</div>
      <img src="${href}" style="max-width: 100%; height: auto;" alt="${name}">
      <div style="margin-top: 10px;"><a href="${href}" style="color: #0066cc;">View full size</a></div>
    </div>`;
    }
    html += `
  </div>
`;
  }

  if (others.length > 0) {
    html += `
  <div style="margin-bottom:30px;">
    <h3>Other Attachments</h3>
    <ul style="list-style: none; padding: 0;">`;
    for (const file of others) {
      html += `
      <li style="margin-bottom: 10px;"><a href="${escapeHtml(file.locator)}" style="color: #0066cc;">${escapeHtml(file.filename)}</a></li>`;
    }
    html += `
    </ul>
  </div>
`;
  }

  html += `
  <div style="margin-top:30px; padding-top:20px; border-top: 1px solid #ddd;">
    <a href="${escapeHtml(data.artifactLocator)}" style="background:#0066cc; color:white; padding:10px 20px; text-decoration:none; border-radius:5px; display:inline-block;">View Full Report in Browser</a>
  </div>
</div>
`;
  return html;
}
