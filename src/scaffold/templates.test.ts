import { describe, expect, it } from "vitest";

import { getScaffoldEntry } from "./catalog.js";
import { buildScaffoldContext, renderMainFile, renderScaffoldTemplate, toIdentifier, toSlug } from "./templates.js";

describe("toSlug", () => {
  it("lowercases and dash-separates names", () => {
    expect(toSlug("Payments API")).toBe("payments-api");
    expect(toSlug("  --Hello, World!-- ")).toBe("hello-world");
    expect(toSlug("***")).toBe("project");
  });
});

describe("toIdentifier", () => {
  it("builds PascalCase identifiers", () => {
    expect(toIdentifier("payments api")).toBe("PaymentsApi");
    expect(toIdentifier("my-cool_app")).toBe("MyCoolApp");
    expect(toIdentifier("2fa service")).toBe("Project2faService");
    expect(toIdentifier("!!!")).toBe("Project");
  });
});

describe("renderMainFile", () => {
  it("renders the pure python entry point with the node name", () => {
    const content = renderMainFile({ framework: "purepy", nodeName: "Billing", nodeType: "custom" });

    expect(content).toBe(
      '# Billing\n# Pure Python application\n\ndef main():\n    print("Hello, Billing!")\n\nif __name__ == "__main__":\n    main()\n',
    );
  });

  it("uses the slug where a resource name is needed", () => {
    const content = renderMainFile({ framework: "kubernetes", nodeName: "Web Front", nodeType: "cloud-backend" });

    expect(content).toContain("  name: web-front\n");
    expect(content).toContain("        image: web-front:latest\n");
  });

  it("uses the identifier for type names", () => {
    const content = renderMainFile({ framework: "swiftui", nodeName: "photo viewer", nodeType: "iphone-app" });

    expect(content).toContain("struct PhotoViewerApp: App {\n");
    expect(content).toContain('Text("Hello, photo viewer!")');
  });

  it("does not HTML-escape names", () => {
    const content = renderMainFile({ framework: "nodejs", nodeName: "A & B <api>", nodeType: "cloud-backend" });

    expect(content.split("\n")[0]).toBe("// A & B <api>");
  });
});

describe("renderScaffoldTemplate", () => {
  it("lists manifest dependencies as valid JSON", () => {
    const entry = getScaffoldEntry("react");
    const context = buildScaffoldContext({ entry, nodeName: "Shop Front", nodeType: "website", runtimeVersion: "20.11.0" });

    const manifest: unknown = JSON.parse(renderScaffoldTemplate("manifests/package.json", context));

    expect(manifest).toMatchObject({
      name: "shop-front",
      description: "Shop Front",
      main: "src/index.js",
      dependencies: { react: "latest", "react-dom": "latest" },
      engines: { node: ">=20.11.0" },
    });
  });

  it("renders an empty dependency object when there are none", () => {
    const entry = getScaffoldEntry("nodejs");
    const context = buildScaffoldContext({ entry, nodeName: "Worker", nodeType: "cloud-backend", runtimeVersion: "20.11.0" });

    const manifest: unknown = JSON.parse(renderScaffoldTemplate("manifests/package.json", context));

    expect(manifest).toMatchObject({ dependencies: {} });
  });

  it("writes one requirement per line", () => {
    const entry = getScaffoldEntry("fastapi");
    const context = buildScaffoldContext({ entry, nodeName: "Api", nodeType: "cloud-backend", runtimeVersion: "3.11" });

    expect(renderScaffoldTemplate("manifests/requirements.txt", context)).toBe(
      "# Api (FastAPI), Python 3.11\nfastapi\nuvicorn\n",
    );
  });

  it("renders the README from labels", () => {
    const entry = getScaffoldEntry("flask");
    const context = buildScaffoldContext({ entry, nodeName: "Blog", nodeType: "website" });

    expect(renderScaffoldTemplate("extras/readme", context)).toBe(
      "# Blog\n\nWebsite project built with Flask (Python).\n\nEntry point: `app.py`\n",
    );
  });

  it("raises a scaffold error for unknown templates", () => {
    const entry = getScaffoldEntry("go");
    const context = buildScaffoldContext({ entry, nodeName: "x", nodeType: "custom" });

    expect(() => renderScaffoldTemplate("main/missing", context)).toThrow(`Scaffold template "main/missing" not found`);
  });
});
