/**
 * Mustache templates for Discourse post bodies.
 *
 * Values are inserted with triple braces: the post is markdown, so nothing is HTML-escaped.
 * Attribute values are sanitized by the renderer before they get here.
 */

/**
 * First post of an event topic: hidden marker, then a discourse-calendar [event] block.
 * Section tags on their own line are standalone, so an empty `details` leaves no blank line.
 */
export const EVENT_BODY_TEMPLATE = `{{{marker}}}
[event start="{{{start}}}"{{#end}} end="{{{end}}}"{{/end}} status="public" name="{{{name}}}"{{#location}} location="{{{location}}}"{{/location}} timezone="{{{timezone}}}"]
{{#details}}
{{{details}}}
{{/details}}
[/event]
`;
