import { chmodSync, copyFileSync, existsSync, mkdirSync, rmSync } from "node:fs";
import * as path from "node:path";
import type { SetupContext } from "../../types.ts";
import { PreconditionError } from "../system/errors.ts";
import { createReporter } from "../system/log.ts";
import { detectDistribution } from "../system/osRelease.ts";
import { addAptSource, aptInstall, snapInstall } from "../system/packages.ts";
import { withTempDir } from "../system/tempDir.ts";
import { extractTarball } from "../system/archive.ts";
import { appendBlock } from "../user/shellRc.ts";
import { installCura } from "../apps/cura.ts";

const log = createReporter("workstation");

const MISE_INSTALLER = "https://mise.run";
const DOCKER_KEYRING = "/etc/apt/keyrings/docker.gpg";
const BRAVE_KEYRING = "/usr/share/keyrings/brave-browser-archive-keyring.gpg";
const CHROME_DEB = "https://dl.google.com/linux/direct/google-chrome-stable_current_amd64.deb";
const LASTPASS_TARBALL = "https://download.cloud.lastpass.com/linux/lplinux.tar.bz2";

const bashrc = (ctx: SetupContext) => path.join(ctx.config.home, ".bashrc");

/** Missing source files are reported, not fatal. */
function copySshKey(ctx: SetupContext) {
    const source = path.join(ctx.config.workstation.filesDir, "id_rsa");
    const sshDir = path.join(ctx.config.home, ".ssh");
    const target = path.join(sshDir, "id_rsa");

    log.step("Copying SSH key...");
    if (!existsSync(source)) {
        log.error(`id_rsa file not found in ${ctx.config.workstation.filesDir}!`);
        return;
    }

    mkdirSync(sshDir, { recursive: true, mode: 0o700 });
    // an earlier copy is read-only
    rmSync(target, { force: true });
    copyFileSync(source, target);
    chmodSync(target, 0o400);
    log.ok("SSH key copied successfully.");
}

function setupBashGit(ctx: SetupContext) {
    const { home, workstation } = ctx.config;
    const target = path.join(home, ".bash_git");

    log.step("Setting up bash_git configuration...");
    if (existsSync(target)) {
        log.note(".bash_git file already exists in home directory");
    } else if (existsSync(path.join(workstation.filesDir, ".bash_git"))) {
        copyFileSync(path.join(workstation.filesDir, ".bash_git"), target);
        log.ok(".bash_git file copied to home directory");
    } else {
        log.error(`.bash_git file not found in ${workstation.filesDir}!`);
    }

    appendBlock(bashrc(ctx), "bash_git", [
        "# Adding bash_git configuration",
        "if [ -f ~/.bash_git ]; then",
        "   . ~/.bash_git",
        "fi",
    ].join("\n"));
}

export async function installBaseSetup(ctx: SetupContext) {
    const { projectsDir } = ctx.config.workstation;

    log.step("Creating software-projects directory...");
    if (existsSync(projectsDir)) {
        log.note(`${projectsDir} already exists.`);
    } else {
        mkdirSync(projectsDir, { recursive: true });
        log.ok(`${projectsDir} created.`);
    }

    log.step("Installing base packages...");
    await aptInstall(ctx.shell, ["curl", "git", "build-essential"]);

    log.step("Installing Flameshot...");
    await snapInstall(ctx.shell, "flameshot");

    copySshKey(ctx);
    setupBashGit(ctx);
}

export async function installMiseRuby(ctx: SetupContext) {
    const { shell, http, config } = ctx;

    log.step("Installing Mise and latest Ruby...");
    await aptInstall(shell, ["build-essential", "rustc", "libssl-dev", "libyaml-dev", "zlib1g-dev", "libgmp-dev"]);
    await shell.exec("sh", [], { input: await http.text(MISE_INSTALLER) });

    appendBlock(bashrc(ctx), 'eval "$(mise activate bash)"', 'eval "$(mise activate bash)"');

    // a fresh install lands in ~/.local/bin, which may not be on PATH yet
    const mise = await shell.exists("mise") ? "mise" : path.join(config.home, ".local/bin/mise");

    for (const tool of ["ruby@3", "node@lts"]) {
        log.step(`Installing ${tool} using Mise...`);
        await shell.exec(mise, ["install", tool]);
        await shell.exec(mise, ["use", "--global", tool]);
    }
}

export async function installPostgres(ctx: SetupContext) {
    const password = ctx.config.workstation.postgresPassword.replaceAll("'", "''");

    log.step("Installing PostgreSQL...");
    await aptInstall(ctx.shell, ["postgresql", "postgresql-client"]);
    await ctx.shell.exec("sudo", ["-u", "postgres", "psql", "-c", `ALTER USER postgres PASSWORD '${password}';`]);
}

async function distributionCodename(ctx: SetupContext) {
    const { codename } = detectDistribution(ctx.config.system.osReleasePath);
    return codename ?? await ctx.shell.exec("lsb_release", ["-cs"], { quiet: true });
}

export async function installDocker(ctx: SetupContext) {
    const { shell, http } = ctx;

    log.step("Installing Docker...");
    const arch = await shell.exec("dpkg", ["--print-architecture"], { quiet: true });
    const codename = await distributionCodename(ctx);

    await addAptSource(shell, http, {
        name: "docker",
        keyUrl: "https://download.docker.com/linux/ubuntu/gpg",
        keyring: DOCKER_KEYRING,
        dearmor: true,
        line: `deb [arch=${arch} signed-by=${DOCKER_KEYRING}] https://download.docker.com/linux/ubuntu ${codename} stable`,
    });
    await aptInstall(shell, ["docker-ce", "docker-ce-cli", "containerd.io", "docker-compose-plugin"]);
}

export async function installBrowsers(ctx: SetupContext) {
    const { shell, http } = ctx;

    log.step("Installing Brave Browser and Google Chrome...");
    await aptInstall(shell, ["curl"]);

    await addAptSource(shell, http, {
        name: "brave-browser-release",
        keyUrl: "https://brave-browser-apt-release.s3.brave.com/brave-browser-archive-keyring.gpg",
        keyring: BRAVE_KEYRING,
        line: `deb [signed-by=${BRAVE_KEYRING}] https://brave-browser-apt-release.s3.brave.com/ stable main`,
    });
    await aptInstall(shell, ["brave-browser"]);

    await withTempDir("chrome", async (dir) => {
        const deb = path.join(dir, path.basename(CHROME_DEB));
        await http.download(CHROME_DEB, deb);
        await aptInstall(shell, [deb]);
    });
}

export async function installIdes(ctx: SetupContext) {
    log.step("Installing VS Code and RubyMine...");
    await snapInstall(ctx.shell, "code", { classic: true });
    await snapInstall(ctx.shell, "rubymine", { classic: true });
}

export async function installLastpass(ctx: SetupContext) {
    log.step("Installing LastPass...");

    await withTempDir("lastpass", async (dir) => {
        const tarball = path.join(dir, "lplinux.tar.bz2");
        await ctx.http.download(LASTPASS_TARBALL, tarball);
        await extractTarball(ctx.shell, tarball, dir);

        const installer = path.join(dir, "install_lastpass.sh");
        if (!existsSync(installer)) throw new PreconditionError("install_lastpass.sh not found in the LastPass download!");

        chmodSync(installer, 0o755);
        await ctx.shell.exec(installer, [], { cwd: dir });
    });
}

export async function installCuraTask(ctx: SetupContext) {
    log.step("Installing Cura...");
    await installCura(ctx);
}
