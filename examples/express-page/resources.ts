import path from "node:path";
import {
  defineGroup,
  defineLink,
  defineScript,
  defineStyle,
} from "../../src/core";

const staticDir = path.join(__dirname, "static");

// Scripts and styles live in separate groups so each can be rendered where
// it belongs in the page.
export const styles = defineGroup({
  uid: "styles",
  directory: path.join(staticDir, "css"),
  path: "static/css",
  members: [
    defineStyle({ uid: "base", file: "base.css", unique: true }),
    defineStyle({ uid: "print", file: "print.css", media: "print", depends: "base" }),
  ],
});

export const icons = defineGroup({
  uid: "icons",
  members: [
    defineLink({
      uid: "favicon",
      url: "https://cdn.example.com/favicon.png",
      rel: "icon",
      type: "image/png",
    }),
  ],
});

let analyticsEnabled = false;

export function setAnalytics(enabled: boolean): void {
  analyticsEnabled = enabled;
}

export const scripts = defineGroup({
  uid: "scripts",
  directory: path.join(staticDir, "js"),
  path: "static/js",
  members: [
    defineScript({ uid: "app", file: "app.js", depends: "vendor", defer: true }),
    defineScript({ uid: "vendor", file: "vendor.js", integrity: true }),
    defineScript({
      uid: "analytics",
      url: "https://cdn.example.com/analytics.js",
      async: true,
      include: () => analyticsEnabled,
    }),
  ],
});
