import {
	Launcher,
	loadLauncherSettings,
	setupFolderStructure,
} from "./src/index";

// Example: install a build with a console progress bar, then start it
async function downloadAndRun(input: string) {
	const settings = await loadLauncherSettings();
	await setupFolderStructure(settings.gameDir);

	const launcher = new Launcher({
		gameDir: settings.gameDir,
		logging: {
			config: { enableConsole: false, enableFile: true },
		},
	});

	launcher.on("phase", (event) => {
		console.log(`[${event.version.tag}] ${event.phase}`);
	});

	launcher.on("progress", (event) => {
		switch (event.kind) {
			case "progress": {
				const percent = (event.fraction * 100).toFixed(1);
				const speed = (event.bytesPerSecond / 1024 / 1024).toFixed(2);
				process.stdout.write(`\r${percent}% (${speed} MB/s)   `);
				break;
			}
			case "finished":
				process.stdout.write("\nDownload finished\n");
				break;
			case "idle":
				break;
		}
	});

	launcher.on("failed", (event) => {
		console.error(`Failed to install ${event.version.tag}: ${event.error.message}`);
	});

	try {
		await launcher.initialize();

		console.log(
			"Installed versions:",
			launcher.installedVersions.map(String).join(", ") || "(none)",
		);

		const result = await launcher.downloadVersion(input);
		switch (result.status) {
			case "rejected":
				console.error(`"${result.input}" is not a version: ${result.error.message}`);
				return;
			case "busy":
				console.error("Another download is running");
				return;
			case "failed":
				return;
			case "already-installed":
				console.log(`${result.version.tag} is already installed`);
				break;
			case "installed":
				console.log(`Installed ${result.version.tag} at ${result.binaryPath}`);
				break;
		}

		const run = await launcher.runVersion(input);
		if (run.success) {
			console.log(`Started ${run.version.tag} (PID: ${run.pid ?? "unknown"})`);
		} else {
			console.error(run.error.message);
		}
	} finally {
		await launcher.dispose();
	}
}

downloadAndRun(process.argv[2] ?? "0.1.0").catch((error: unknown) => {
	console.error(error);
	process.exitCode = 1;
});
