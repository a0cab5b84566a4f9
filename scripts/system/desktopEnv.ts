export function detectDesktop(env: NodeJS.ProcessEnv) {
    return env.XDG_CURRENT_DESKTOP || env.DESKTOP_SESSION || "unknown";
}

export function isGnome(desktop: string) {
    return desktop.toLowerCase().includes("gnome");
}
