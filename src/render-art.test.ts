import { buildArtHtml, contentToHtml, escapeHtml, goalsToHtml, markdownToHtml, parseGoals } from "./render-art.js";

describe("render-art", () => {
  it("converts markdown through marked", async () => {
    expect(await markdownToHtml("# Today\n\nShip **one** thing")).toBe(
      "<h1>Today</h1>\n<p>Ship <strong>one</strong> thing</p>\n"
    );
  });

  it("reads goals from plain lines, bullets, numbers and task boxes", () => {
    const text = [
      "Run 5k",
      "",
      "- Read a book",
      "* [ ] Call grandma",
      "+ [x] Fix the bike",
      "3. Learn a song",
      "4) Plant tomatoes",
      "   ",
    ].join("\n");
    expect(parseGoals(text)).toEqual([
      "Run 5k",
      "Read a book",
      "Call grandma",
      "Fix the bike",
      "Learn a song",
      "Plant tomatoes",
    ]);
  });

  it("handles CRLF goal files", () => {
    expect(parseGoals("- one\r\n- two\r\n")).toEqual(["one", "two"]);
  });

  it("renders goals as an escaped list under an optional heading", () => {
    expect(goalsToHtml(["Eat <greens>", "Sleep & rest"], "This week")).toBe(
      "<h1>This week</h1>\n" +
      '<ul class="goals">\n' +
      "  <li>Eat &lt;greens&gt;</li>\n" +
      "  <li>Sleep &amp; rest</li>\n" +
      "</ul>"
    );
    expect(goalsToHtml(["One"])).toBe('<ul class="goals">\n  <li>One</li>\n</ul>');
  });

  it("dispatches on the content kind", async () => {
    expect(await contentToHtml({ kind: "goals", goals: ["One"] })).toBe('<ul class="goals">\n  <li>One</li>\n</ul>');
    expect(await contentToHtml({ kind: "markdown", markdown: "hi" })).toBe("<p>hi</p>\n");
  });

  it("builds one fixed-size document with the theme inlined", () => {
    const html = buildArtHtml({ bodyHtml: "<p>hi</p>", css: "body { color: red; }" });
    expect(html.startsWith("<!doctype html>")).toBe(true);
    expect(html).toContain("<style>\nbody { color: red; }\n  </style>");
    expect(html).toContain("html, body { width:1920px; height:1080px; overflow:hidden; }");
    expect(html).toContain('<div class="container">\n<p>hi</p>\n  </div>');
  });

  it("escapes quotes too", () => {
    expect(escapeHtml(`"it's"`)).toBe("&quot;it&#39;s&quot;");
  });
});
