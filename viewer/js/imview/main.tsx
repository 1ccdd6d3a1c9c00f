import * as React from "react";
import { createRoot } from "react-dom/client";
import { SERVER } from "../CONFIG";
import { defaultSocketUrl } from "../client";
import { injectBaseCSS } from "../core";
import { ImView } from "./index";

injectBaseCSS(document);

const rootElement = document.getElementById("root");
if (!rootElement) {
  throw new Error("missing #root element");
}

createRoot(rootElement).render(
  <React.StrictMode>
    <ImView socketUrl={defaultSocketUrl(window.location, SERVER.SOCKET_PATH)} />
  </React.StrictMode>,
);
