export interface CliArgs {
    configPath: string;
    envPath: string;
    markets: string[];
    sim: boolean;
    verbose: boolean;
    statusReport: boolean;
}

export function parseCliArgs(argv: string[] = process.argv.slice(2)): CliArgs {
    // --name=VAL
    const getArgValue = (name: string, defaultVal: string): string => {
        const arg = argv.find(a => a.startsWith(`--${name}=`));
        if (!arg) return defaultVal;
        const val = arg.slice(name.length + 3).trim();
        return val.length > 0 ? val : defaultVal;
    };

    // --name, --name=true|false
    const getBoolArg = (name: string, defaultVal: boolean): boolean => {
        if (argv.includes(`--${name}`)) return true;
        const arg = argv.find(a => a.startsWith(`--${name}=`));
        if (arg) return arg.split("=")[1].toLowerCase() === "true";
        return defaultVal;
    };

    const markets = getArgValue("markets", "")
        .split(",")
        .map(m => m.trim())
        .filter(m => m.length > 0);

    return {
        configPath: getArgValue("config", "config/maker.json"),
        envPath: getArgValue("env", ".env"),
        markets,
        sim: getBoolArg("sim", false),
        verbose: getBoolArg("verbose", false) || argv.includes("-v"),
        statusReport: !argv.includes("--no-report")
    };
}
