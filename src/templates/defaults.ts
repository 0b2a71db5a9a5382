/**
 * Built-in default templates
 * Used when no template setting is given
 */

export const DEFAULT_HTML_TEMPLATE = `<!DOCTYPE html>
<html lang="{{lang}}">
<head>
<meta charset="{{charset}}">
{{#if title}}
<title>{{{title}}}</title>
{{/if}}
{{{head}}}</head>
<body>
{{{body}}}
{{#if messages}}
<div class="system-messages">
<h2>System Messages</h2>
{{{messages}}}</div>
{{/if}}
</body>
</html>
`;
