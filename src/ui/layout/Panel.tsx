import type React from "react";
import "./Panel.css";

export function Panel({
  variant,
  className,
  ...props
}: React.HTMLAttributes<HTMLElement> & { variant?: "inspector" }) {
  return (
    <section
      {...props}
      className={["panel", variant && `panel--${variant}`, className].filter(Boolean).join(" ")}
    />
  );
}
