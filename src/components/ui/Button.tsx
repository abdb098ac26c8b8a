import type { ButtonHTMLAttributes } from "react";
import { cn } from "@/lib/cn";

type ButtonVariant = "secondary" | "success" | "destructive" | "ghost" | "link";

/** `sm` for card actions, `block` for the full-width run/reset pair. */
type ButtonSize = "sm" | "block";

export interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: ButtonVariant;
  size?: ButtonSize;
}

const variantClasses: Record<ButtonVariant, string> = {
  secondary: "bg-secondary text-secondary-foreground hover:opacity-80",
  success: "bg-success text-success-foreground hover:opacity-90",
  destructive: "bg-destructive text-destructive-foreground hover:opacity-90",
  ghost: "bg-transparent text-foreground hover:bg-accent",
  link: "bg-transparent text-muted-foreground underline hover:text-foreground",
};

const sizeClasses: Record<ButtonSize, string> = {
  sm: "h-8 px-3",
  block: "h-10 w-full px-4",
};

export function Button({
  className,
  variant = "secondary",
  size = "sm",
  type = "button",
  ...props
}: ButtonProps) {
  return (
    <button
      type={type}
      className={cn(
        "inline-flex items-center justify-center rounded-md text-sm font-medium transition-opacity disabled:pointer-events-none disabled:opacity-50",
        variantClasses[variant],
        sizeClasses[size],
        className,
      )}
      {...props}
    />
  );
}
