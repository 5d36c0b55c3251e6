export const GH_INSTALL_GUIDE = [
  "GitHub CLI (gh) is required for repository access.",
  "Install instructions: https://cli.github.com/",
  "Linux command (Ubuntu/Debian): sudo apt install gh",
  "Arch Linux: sudo pacman -S github-cli",
].join("\n");

export function ghLoginGuide(hostname = "github.com"): string {
  return [
    "GitHub CLI authentication is required.",
    "Command to copy: ",
    `gh auth login --hostname ${hostname} --git-protocol https --web`,
    "Then run:",
    "gh auth status",
  ].join("\n");
}
