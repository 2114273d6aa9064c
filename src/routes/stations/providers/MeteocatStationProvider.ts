import { RawPayload } from "../../../types";
import { InventoryStation, InventoryStationProvider, isRecord, numberField, textField } from "../StationProvider";

/**
 * A station is open unless every status entry carries an end date. Stations without any status are kept.
 */
function hasOpenStatus( entry: RawPayload ): boolean {
	const statuses = entry.estats;
	if ( !Array.isArray( statuses ) || statuses.length === 0 ) {
		return true;
	}
	return statuses.some( ( status ) => isRecord( status ) && ( status.dataFi === null || status.dataFi === undefined || status.dataFi === "" ) );
}

/**
 * Meteocat XEMA stations (`[ { codi, nom, coordenades: { latitud, longitud }, altitud, estats } ]`). Closed stations
 * are left out.
 */
export class MeteocatStationProvider extends InventoryStationProvider {
	public readonly providerId = "METEOCAT";
	public readonly providerName = "Meteocat";
	protected readonly inventoryFile = "meteocat.json";

	protected toStation( entry: RawPayload ): InventoryStation | undefined {
		if ( !hasOpenStatus( entry ) || !isRecord( entry.coordenades ) ) {
			return undefined;
		}
		return {
			stationId: textField( entry, "codi" ),
			name: textField( entry, "nom" ),
			lat: numberField( entry.coordenades, "latitud" ),
			lon: numberField( entry.coordenades, "longitud" ),
			elevation: numberField( entry, "altitud" )
		};
	}
}
